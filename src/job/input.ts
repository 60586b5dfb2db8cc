import { z } from "zod";

import { InputValidationError } from "../worker/errors.js";
import type { GraphNode, JobGraph, JsonValue } from "../worker/types.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const graphNodeSchema: z.ZodType<GraphNode, z.ZodTypeDef, unknown> = z
  .object({
    class_type: z.string().min(1),
    inputs: z.record(jsonValueSchema).default({}),
  })
  .catchall(jsonValueSchema);

const workflowSchema = z.record(graphNodeSchema);

const inputImageSchema = z.object({
  name: z.string().min(1),
  image: z.string().min(1),
});

export type InputImage = z.infer<typeof inputImageSchema>;

export interface JobInput {
  readonly workflow: JobGraph;
  readonly images: readonly InputImage[];
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates the raw `input` of a job. The payload may be an object or its JSON
 * serialisation.
 *
 * @throws InputValidationError with a message suitable for the result payload.
 */
export function parseJobInput(raw: unknown): JobInput {
  if (raw === null || raw === undefined) {
    throw new InputValidationError("Please provide input");
  }

  let candidate: unknown = raw;
  if (typeof raw === "string") {
    try {
      candidate = JSON.parse(raw);
    } catch (error) {
      throw new InputValidationError("Invalid JSON format in input", { cause: error });
    }
  }
  if (!isPlainRecord(candidate)) {
    throw new InputValidationError("Input must be a JSON object");
  }

  const workflow = candidate["workflow"];
  if (workflow === undefined || workflow === null) {
    throw new InputValidationError("Missing 'workflow' parameter");
  }
  const parsedWorkflow = workflowSchema.safeParse(workflow);
  if (!parsedWorkflow.success) {
    const details = parsedWorkflow.error.issues.map((issue) => `${issue.path.join(".") || "workflow"}: ${issue.message}`);
    throw new InputValidationError("'workflow' must map node ids to objects with 'class_type' and 'inputs'", {
      details,
    });
  }

  const images = candidate["images"];
  if (images === undefined || images === null) {
    return { workflow: parsedWorkflow.data, images: [] };
  }
  const parsedImages = z.array(inputImageSchema).safeParse(images);
  if (!parsedImages.success) {
    throw new InputValidationError("'images' must be a list of objects with 'name' and 'image' keys");
  }
  return { workflow: parsedWorkflow.data, images: parsedImages.data };
}
