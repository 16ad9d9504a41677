/**
 * Wire frames exchanged between the controller and a worker process.
 *
 * Every frame carries a `kind`. Control frames drive the lifecycle signals
 * and never enter the call inbox; all other frames are queued in arrival
 * order.
 */

import { z } from 'zod';
import { serializedErrorSchema } from '../utils/error-handler.js';

export const lifecycleSignalSchema = z.enum(['close-requested', 'worker-closed']);

/**
 * One-shot lifecycle transition announced to the peer.
 */
export const controlFrameSchema = z.object({
  kind: z.literal('control'),
  signal: lifecycleSignalSchema,
});

/**
 * Operation request. `name` is a method name or one of the reserved
 * attribute operations.
 */
export const callRequestSchema = z.object({
  kind: z.literal('call'),
  name: z.string().min(1),
  args: z.array(z.unknown()),
  kwargs: z.record(z.unknown()),
});

/**
 * Settings the worker loop runs with, chosen by the controller.
 */
export const workerSettingsSchema = z.object({
  pollTimeoutMs: z.number().int().positive(),
  drainOnClose: z.boolean(),
});

/**
 * First frame a worker receives: what to construct and how to run.
 */
export const bootstrapFrameSchema = z.object({
  kind: z.literal('bootstrap'),
  module: z.string().min(1),
  exportName: z.string().min(1),
  args: z.array(z.unknown()),
  settings: workerSettingsSchema,
});

export const callReplySchema = z.discriminatedUnion('ok', [
  z.object({ kind: z.literal('reply'), ok: z.literal(true), value: z.unknown() }),
  z.object({ kind: z.literal('reply'), ok: z.literal(false), error: serializedErrorSchema }),
]);

/** Frames the worker accepts into its inbox. */
export const workerInboundSchema = z.discriminatedUnion('kind', [callRequestSchema, bootstrapFrameSchema]);

export type LifecycleSignalName = z.infer<typeof lifecycleSignalSchema>;
export type ControlFrame = z.infer<typeof controlFrameSchema>;
export type CallRequest = z.infer<typeof callRequestSchema>;
export type WorkerSettings = z.infer<typeof workerSettingsSchema>;
export type BootstrapFrame = z.infer<typeof bootstrapFrameSchema>;
export type CallReply = z.infer<typeof callReplySchema>;
export type WorkerInbound = z.infer<typeof workerInboundSchema>;

/** Everything the controller sends. */
export type ControllerFrame = WorkerInbound | ControlFrame;

/** Everything the worker sends. */
export type WorkerFrame = CallReply | ControlFrame;
