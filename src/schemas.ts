import { z } from "zod";
import { type ErrorCode, ValidationError } from "./errors.js";

const TimeoutSeconds = z.number().finite().nonnegative();
const WorkerCount = z.number().int().positive();

export const TaskMetadataSchema = z
  .object({
    timeout: TimeoutSeconds.optional(),
    requirements: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const RunnerOptionsSchema = z.object({
  maxWorkers: WorkerCount.optional(),
});

export const RunnerConfigSchema = z.object({
  tasks: z.object({ defaultTimeoutSeconds: TimeoutSeconds }),
  limits: z.object({ maxWorkers: WorkerCount }),
  logging: z.object({ level: z.enum(["debug", "info", "warn", "error"]) }),
});

/**
 * Parse `value` with `schema`, turning a zod failure into a ValidationError
 * whose message lists every issue as `path: message`.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  code: ErrorCode,
  label: string,
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;

  const issues = parsed.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
  throw new ValidationError(code, `Invalid ${label}: ${issues.join("; ")}`, issues);
}
