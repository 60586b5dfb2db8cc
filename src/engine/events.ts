import { z } from "zod";

/** Node ids arrive as strings, older engine builds occasionally send numbers. */
const nodeIdSchema = z
  .union([z.string(), z.number()])
  .transform(String)
  .nullable()
  .optional()
  .transform((value) => value ?? null);

const promptIdSchema = z
  .string()
  .nullable()
  .optional()
  .transform((value) => value ?? null);

const textSchema = z
  .union([z.string(), z.number()])
  .transform(String)
  .nullable()
  .optional()
  .transform((value) => value ?? null);

const frameSchema = z.object({
  type: z.string(),
  data: z.record(z.unknown()).nullable().optional(),
});

const statusDataSchema = z.object({
  status: z
    .object({
      exec_info: z.object({ queue_remaining: z.number().optional() }).passthrough().optional(),
    })
    .passthrough()
    .optional(),
});

const progressDataSchema = z.object({
  node: nodeIdSchema,
  value: z.number().default(0),
  max: z.number().default(100),
  prompt_id: promptIdSchema,
});

const nodeDataSchema = z.object({
  node: nodeIdSchema,
  prompt_id: promptIdSchema,
});

const executionErrorDataSchema = z.object({
  prompt_id: promptIdSchema,
  node_id: nodeIdSchema,
  node_type: textSchema,
  exception_message: textSchema,
});

export type LifecycleEvent =
  | { readonly type: "status"; readonly queueRemaining: number | null }
  | {
      readonly type: "progress";
      readonly node: string | null;
      readonly value: number;
      readonly max: number;
      readonly promptId: string | null;
    }
  | { readonly type: "executing"; readonly node: string | null; readonly promptId: string | null }
  | { readonly type: "executed"; readonly node: string | null; readonly promptId: string | null }
  | {
      readonly type: "execution_error";
      readonly promptId: string | null;
      readonly nodeId: string | null;
      readonly nodeType: string | null;
      readonly exceptionMessage: string | null;
    }
  | { readonly type: "unknown"; readonly rawType: string };

export type DecodedFrame =
  | { readonly ok: true; readonly event: LifecycleEvent }
  | { readonly ok: false; readonly reason: string };

function malformed(reason: string): DecodedFrame {
  return { ok: false, reason };
}

/** Decodes one text frame of the streaming connection. Never throws. */
export function decodeLifecycleFrame(text: string): DecodedFrame {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return malformed("frame is not valid JSON");
  }

  const frame = frameSchema.safeParse(raw);
  if (!frame.success) {
    return malformed("frame is missing a string 'type'");
  }
  const data = frame.data.data ?? {};

  switch (frame.data.type) {
    case "status": {
      const parsed = statusDataSchema.safeParse(data);
      const queueRemaining = parsed.success ? (parsed.data.status?.exec_info?.queue_remaining ?? null) : null;
      return { ok: true, event: { type: "status", queueRemaining } };
    }
    case "progress": {
      const parsed = progressDataSchema.safeParse(data);
      if (!parsed.success) {
        return malformed("progress frame carries an invalid payload");
      }
      const { node, value, max, prompt_id: promptId } = parsed.data;
      return { ok: true, event: { type: "progress", node, value, max, promptId } };
    }
    case "executing":
    case "executed": {
      const parsed = nodeDataSchema.safeParse(data);
      if (!parsed.success) {
        return malformed(`${frame.data.type} frame carries an invalid payload`);
      }
      const type = frame.data.type === "executing" ? "executing" : "executed";
      return { ok: true, event: { type, node: parsed.data.node, promptId: parsed.data.prompt_id } };
    }
    case "execution_error": {
      const parsed = executionErrorDataSchema.safeParse(data);
      if (!parsed.success) {
        return malformed("execution_error frame carries an invalid payload");
      }
      return {
        ok: true,
        event: {
          type: "execution_error",
          promptId: parsed.data.prompt_id,
          nodeId: parsed.data.node_id,
          nodeType: parsed.data.node_type,
          exceptionMessage: parsed.data.exception_message,
        },
      };
    }
    default:
      return { ok: true, event: { type: "unknown", rawType: frame.data.type } };
  }
}

/** Percentage of a progress event, `0` when the engine reports no maximum. */
export function progressPercent(event: Extract<LifecycleEvent, { type: "progress" }>): number {
  return event.max > 0 ? (event.value / event.max) * 100 : 0;
}
