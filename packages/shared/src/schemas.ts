/**
 * Zod schemas for validating client events arriving over the WebSocket.
 */

import { z } from 'zod';
import { VIEW_ROLES } from './deck.js';
import { ClientEventType, type ClientEvent } from './events.js';

export const sizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

const positionField = z.number().int();

export const clientEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal(ClientEventType.HELLO),
    role: z.enum(VIEW_ROLES),
    viewport: sizeSchema.optional(),
  }),
  z.object({
    type: z.literal(ClientEventType.IMPORT_FILES),
    paths: z.array(z.string().min(1)),
  }),
  z.object({ type: z.literal(ClientEventType.REMOVE_SLIDE), position: positionField }),
  z.object({ type: z.literal(ClientEventType.MOVE_SLIDE), from: positionField, to: positionField }),
  z.object({ type: z.literal(ClientEventType.JUMP_TO), position: positionField }),
  z.object({ type: z.literal(ClientEventType.NEXT) }),
  z.object({ type: z.literal(ClientEventType.PREVIOUS) }),
  z.object({
    type: z.literal(ClientEventType.SET_NOTES),
    slideId: z.number().int().nonnegative().optional(),
    text: z.string(),
  }),
  z.object({ type: z.literal(ClientEventType.SAVE_NOTES) }),
  z.object({ type: z.literal(ClientEventType.START_TIMER) }),
  z.object({ type: z.literal(ClientEventType.STOP_TIMER) }),
  z.object({ type: z.literal(ClientEventType.RESET_TIMER) }),
  z.object({ type: z.literal(ClientEventType.EXPORT_PDF), outputPath: z.string().min(1) }),
  z.object({
    type: z.literal(ClientEventType.ENTER_PRESENTATION),
    display: sizeSchema.optional(),
  }),
  z.object({ type: z.literal(ClientEventType.EXIT_PRESENTATION) }),
  z.object({ type: z.literal(ClientEventType.VIEWPORT), viewport: sizeSchema }),
]);

export type ParsedClientEvent = z.infer<typeof clientEventSchema>;

export type ClientEventParseResult =
  | { success: true; event: ClientEvent }
  | { success: false; error: string };

/**
 * Validate a decoded WebSocket payload.
 */
export function parseClientEvent(raw: unknown): ClientEventParseResult {
  const result = clientEventSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { success: false, error: `${where}${issue?.message ?? 'Invalid event'}` };
  }
  const event: ClientEvent = result.data;
  return { success: true, event };
}
