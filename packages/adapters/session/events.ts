/**
 * Interaction Events
 *
 * What a gateway hands the conversation engine. Validated with zod so a
 * malformed event is dropped before it reaches a session.
 */

import { z } from 'zod';

const sessionIdSchema = z.string().min(1);

export const textEventSchema = z.object({
  type: z.literal('text'),
  sessionId: sessionIdSchema,
  text: z.string(),
});

export const buttonEventSchema = z.object({
  type: z.literal('button'),
  sessionId: sessionIdSchema,
  payload: z.string().min(1),
});

export const commandEventSchema = z.object({
  type: z.literal('command'),
  sessionId: sessionIdSchema,
  name: z
    .string()
    .min(1)
    .transform((name) => name.toLowerCase()),
  args: z.array(z.string()).default([]),
});

export const interactionEventSchema = z.discriminatedUnion('type', [
  textEventSchema,
  buttonEventSchema,
  commandEventSchema,
]);

/** Event as produced by a gateway (args optional) */
export type InteractionEventInput = z.input<typeof interactionEventSchema>;

/** Event after validation */
export type InteractionEvent = z.output<typeof interactionEventSchema>;
export type TextEvent = z.output<typeof textEventSchema>;
export type ButtonEvent = z.output<typeof buttonEventSchema>;
export type CommandEvent = z.output<typeof commandEventSchema>;
