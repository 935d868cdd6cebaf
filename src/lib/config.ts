import { z } from "zod";
import { ConfigurationError } from "./errors";

const formatIssue = (issue: z.ZodIssue): string => {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
};

/**
 * Parses a policy object against its schema and freezes the result.
 * Zod issues are rethrown as a ConfigurationError naming the first issue.
 */
export const parsePolicy = <S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string
): Readonly<z.output<S>> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    throw new ConfigurationError(`Invalid ${label}: ${issues[0] ?? "unknown issue"}`, issues);
  }
  const data: z.output<S> = parsed.data;
  return Object.freeze(data);
};

export const columnListSchema = z.array(z.string().min(1));
