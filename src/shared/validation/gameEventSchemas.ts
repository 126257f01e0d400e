import { z } from 'zod';
import { MalformedEventError } from '../errors';

/**
 * Zod schemas for the NDJSON event streams of the game service.
 *
 * Two streams are consumed:
 * - the account-wide incoming-event stream (challenges, game starts)
 * - the per-game state stream (full state, incremental state, chat, offers)
 *
 * Known event kinds are validated strictly enough for the session controller
 * to rely on their fields. Kinds the bot does not react to decode into an
 * `unknown` variant so the switch over each union stays exhaustive.
 */

// --- Game stream events ---

const GamePlayerSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  aiLevel: z.number().optional(),
});

const GameStateFieldsSchema = z.object({
  moves: z.string().default(''),
  status: z.string().min(1),
  winner: z.enum(['white', 'black']).optional(),
});

export const GameStateEventSchema = GameStateFieldsSchema.extend({
  type: z.literal('gameState'),
});

export type GameStateEvent = z.infer<typeof GameStateEventSchema>;

export const GameFullEventSchema = z.object({
  type: z.literal('gameFull'),
  id: z.string().min(1),
  white: GamePlayerSchema,
  black: GamePlayerSchema,
  state: GameStateFieldsSchema,
});

export type GameFullEvent = z.infer<typeof GameFullEventSchema>;

export const ChatLineEventSchema = z.object({
  type: z.literal('chatLine'),
  room: z.string().default('player'),
  username: z.string().default(''),
  text: z.string().default(''),
});

export type ChatLineEvent = z.infer<typeof ChatLineEventSchema>;

export const TakebackOfferedEventSchema = z.object({
  type: z.literal('takebackOffered'),
});

export type TakebackOfferedEvent = z.infer<typeof TakebackOfferedEventSchema>;

export interface UnknownEvent {
  type: 'unknown';
  /** The `type` tag the service sent. */
  rawType: string;
}

export type GameStreamEvent =
  | GameFullEvent
  | GameStateEvent
  | ChatLineEvent
  | TakebackOfferedEvent
  | UnknownEvent;

// --- Incoming (account) stream events ---

export const ChallengeEventSchema = z.object({
  type: z.literal('challenge'),
  challenge: z.object({
    id: z.string().min(1),
    challenger: z.object({ id: z.string().optional(), name: z.string().optional() }).optional(),
  }),
});

export type ChallengeEvent = z.infer<typeof ChallengeEventSchema>;

export const GameStartEventSchema = z
  .object({
    type: z.literal('gameStart'),
    game: z
      .object({
        id: z.string().min(1).optional(),
        gameId: z.string().min(1).optional(),
      })
      .refine((game) => game.id !== undefined || game.gameId !== undefined, {
        message: 'game id is required',
      }),
  })
  .transform((event) => ({
    type: event.type,
    gameId: event.game.gameId ?? event.game.id ?? '',
  }));

export type GameStartEvent = z.infer<typeof GameStartEventSchema>;

export type IncomingEvent = ChallengeEvent | GameStartEvent | UnknownEvent;

// --- Decoding ---

const TypeTagSchema = z.object({ type: z.string().min(1) }).passthrough();

function readTypeTag(raw: unknown): string {
  const tagged = TypeTagSchema.safeParse(raw);
  if (!tagged.success) {
    throw new MalformedEventError('missing event type');
  }
  return tagged.data.type;
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, type: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new MalformedEventError(`invalid ${type} event`, {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

/**
 * Decode one object from the per-game state stream.
 */
export function parseGameStreamEvent(raw: unknown): GameStreamEvent {
  const type = readTypeTag(raw);
  switch (type) {
    case 'gameFull':
      return parseWith(GameFullEventSchema, raw, type);
    case 'gameState':
      return parseWith(GameStateEventSchema, raw, type);
    case 'chatLine':
      return parseWith(ChatLineEventSchema, raw, type);
    case 'takebackOffered':
      return parseWith(TakebackOfferedEventSchema, raw, type);
    default:
      return { type: 'unknown', rawType: type };
  }
}

/**
 * Decode one object from the account-wide incoming-event stream.
 */
export function parseIncomingEvent(raw: unknown): IncomingEvent {
  const type = readTypeTag(raw);
  switch (type) {
    case 'challenge':
      return parseWith(ChallengeEventSchema, raw, type);
    case 'gameStart':
      return parseWith(GameStartEventSchema, raw, type);
    default:
      return { type: 'unknown', rawType: type };
  }
}
