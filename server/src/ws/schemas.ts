import { z } from 'zod';
import type { ControlEvent } from '../types.js';

export const envelopeSchema = z
  .object({
    type: z.string(),
  })
  .passthrough();

const ratioSchema = z.number().finite().min(0).max(1);

export const controlEventSchema = z.discriminatedUnion('name', [
  z.object({
    type: z.literal('event'),
    name: z.literal('click'),
    x_ratio: ratioSchema,
    y_ratio: ratioSchema,
  }),
  z.object({
    type: z.literal('event'),
    name: z.literal('key'),
    key: z.string().min(1).max(64),
  }),
  z.object({
    type: z.literal('event'),
    name: z.literal('navigate'),
    url: z.string().trim().min(1).max(2048),
  }),
  z.object({
    type: z.literal('event'),
    name: z.literal('wheel'),
    deltaY: z.number().finite(),
    clientHeight: z.number().finite().nonnegative().nullish(),
  }),
]);

export type ControlEventMessage = z.infer<typeof controlEventSchema>;

export function toControlEvent(message: ControlEventMessage): ControlEvent {
  switch (message.name) {
    case 'click':
      return { kind: 'click', xRatio: message.x_ratio, yRatio: message.y_ratio };
    case 'key':
      return { kind: 'key', value: message.key };
    case 'navigate':
      return { kind: 'navigate', url: message.url };
    case 'wheel':
      return { kind: 'wheel', deltaY: message.deltaY, clientHeight: message.clientHeight ?? 0 };
  }
}

export type ParsedClientMessage =
  | { kind: 'event'; event: ControlEvent }
  | { kind: 'ignored'; type: string }
  | { kind: 'invalid'; reason: string };

export function parseClientMessage(raw: string): ParsedClientMessage {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { kind: 'invalid', reason: 'invalid_json' };
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    return { kind: 'invalid', reason: 'invalid_envelope' };
  }
  if (envelope.data.type !== 'event') {
    return { kind: 'ignored', type: envelope.data.type };
  }

  const event = controlEventSchema.safeParse(json);
  if (!event.success) {
    return { kind: 'invalid', reason: event.error.issues[0]?.message ?? 'invalid_event' };
  }
  return { kind: 'event', event: toControlEvent(event.data) };
}
