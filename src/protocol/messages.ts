import { z } from "zod";

import { JsonObjectSchema, JsonValueSchema } from "./json.js";

// =============================================================================
// QUEUE ROLES
// =============================================================================

export const QUEUE_ROLES = [
  "caller",
  "orchestrator-request",
  "orchestrator-response",
  "copy-request",
  "copy-response",
  "delta",
  "readiness",
  "error",
  "api-state-publish",
  "api-delta",
] as const;

export const QueueRoleSchema = z.enum(QUEUE_ROLES);
export type QueueRole = z.infer<typeof QueueRoleSchema>;

export const WORK_SCOPED_ROLES = [
  "caller",
  "orchestrator-request",
  "orchestrator-response",
  "copy-request",
  "copy-response",
] as const satisfies readonly QueueRole[];

export type WorkScopedRole = (typeof WORK_SCOPED_ROLES)[number];

export function isWorkScopedRole(role: QueueRole): role is WorkScopedRole {
  return (WORK_SCOPED_ROLES as readonly QueueRole[]).includes(role);
}

// =============================================================================
// MESSAGE SCHEMAS
// =============================================================================

export const RemoteErrorInfoSchema = z.object({
  name: z.string(),
  message: z.string(),
  stack: z.string().optional(),
  code: z.string().optional(),
});
export type RemoteErrorInfo = z.infer<typeof RemoteErrorInfoSchema>;

export const CallRequestSchema = z.object({
  kind: z.literal("call"),
  seq: z.number().int().nonnegative(),
  args: z.array(JsonValueSchema),
  sent_at: z.string(),
});
export type CallRequest = z.infer<typeof CallRequestSchema>;

export const CallResponseSchema = z.discriminatedUnion("ok", [
  z.object({
    kind: z.literal("result"),
    seq: z.number().int().nonnegative(),
    ok: z.literal(true),
    value: JsonValueSchema,
  }),
  z.object({
    kind: z.literal("result"),
    seq: z.number().int().nonnegative(),
    ok: z.literal(false),
    error: RemoteErrorInfoSchema,
  }),
]);
export type CallResponse = z.infer<typeof CallResponseSchema>;

export const ControlMessageSchema = z.object({
  kind: z.literal("stop"),
  reason: z.string().optional(),
});
export type ControlMessage = z.infer<typeof ControlMessageSchema>;

export const CopyRequestSchema = z.object({
  kind: z.literal("copy"),
  request_id: z.number().int().nonnegative(),
});
export type CopyRequest = z.infer<typeof CopyRequestSchema>;

export const CopyResponseSchema = z.object({
  kind: z.literal("copy"),
  request_id: z.number().int().nonnegative(),
  work_name: z.string().min(1),
  epoch: z.number().int().positive(),
  last_delta_id: z.number().int().nonnegative(),
  state: JsonObjectSchema,
});
export type CopyResponse = z.infer<typeof CopyResponseSchema>;

// Keys that resolve to prototype machinery instead of own properties.
export const RESERVED_PATH_SEGMENTS: ReadonlySet<string> = new Set([
  "__proto__",
  "constructor",
  "prototype",
]);

const StatePathSchema = z
  .array(
    z
      .string()
      .min(1)
      .refine((segment) => !RESERVED_PATH_SEGMENTS.has(segment), {
        message: "Reserved state path segment",
      }),
  )
  .min(1);

export const DeltaOpSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("set"), path: StatePathSchema, value: JsonValueSchema }),
  z.object({ op: z.literal("delete"), path: StatePathSchema }),
]);
export type DeltaOp = z.infer<typeof DeltaOpSchema>;

export const DeltaSchema = z.object({
  work_name: z.string().min(1),
  epoch: z.number().int().positive(),
  id: z.number().int().positive(),
  ops: z.array(DeltaOpSchema).min(1),
  emitted_at: z.string(),
});
export type Delta = z.infer<typeof DeltaSchema>;

export const ReadinessSignalSchema = z.object({
  work_name: z.string().min(1),
  epoch: z.number().int().positive(),
  at: z.string(),
});
export type ReadinessSignal = z.infer<typeof ReadinessSignalSchema>;

export const ErrorSignalSchema = z.object({
  work_name: z.string().min(1),
  epoch: z.number().int().positive(),
  error: RemoteErrorInfoSchema,
  at: z.string(),
});
export type ErrorSignal = z.infer<typeof ErrorSignalSchema>;

export const ApiDeltaSchema = z.object({
  ops: z.array(DeltaOpSchema).min(1),
});
export type ApiDelta = z.infer<typeof ApiDeltaSchema>;

export const ApiStatePublishSchema = z.object({
  version: z.number().int().nonnegative(),
  state: JsonObjectSchema,
});
export type ApiStatePublish = z.infer<typeof ApiStatePublishSchema>;

// =============================================================================
// ROLE MAP
// =============================================================================

export type RoleMessage = {
  caller: CallRequest;
  "orchestrator-request": ControlMessage;
  "orchestrator-response": CallResponse;
  "copy-request": CopyRequest;
  "copy-response": CopyResponse;
  delta: Delta;
  readiness: ReadinessSignal;
  error: ErrorSignal;
  "api-state-publish": ApiStatePublish;
  "api-delta": ApiDelta;
};

export const ROLE_SCHEMAS: { [R in QueueRole]: z.ZodType<RoleMessage[R]> } = {
  caller: CallRequestSchema,
  "orchestrator-request": ControlMessageSchema,
  "orchestrator-response": CallResponseSchema,
  "copy-request": CopyRequestSchema,
  "copy-response": CopyResponseSchema,
  delta: DeltaSchema,
  readiness: ReadinessSignalSchema,
  error: ErrorSignalSchema,
  "api-state-publish": ApiStatePublishSchema,
  "api-delta": ApiDeltaSchema,
};

export function parseRoleMessage<R extends QueueRole>(
  role: R,
  message: unknown,
): RoleMessage[R] | null {
  const parsed = ROLE_SCHEMAS[role].safeParse(message);
  return parsed.success ? parsed.data : null;
}

// =============================================================================
// TRANSPORT FRAMES
// =============================================================================

export const TransportFrameSchema = z.object({
  role: QueueRoleSchema,
  message: z.unknown(),
});
export type TransportFrame = z.infer<typeof TransportFrameSchema>;
