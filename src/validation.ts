import { z } from "zod";
import { DataValidationError, type FieldIssue } from "./errors.js";
import type { PullRequestInput, PullRequestRecord } from "./types.js";

const VALID_STATES = ["open", "closed", "merged"] as const;

const REPO_NAME = /^[\w.-]+\/[\w.-]+$/;

const ReviewSchema = z.object({
  user: z.string(),
  state: z.string(),
  body: z.string(),
  submittedAt: z.string().nullable(),
});

const FileChangeSchema = z.object({
  filename: z.string(),
  status: z.string(),
  additions: z.number().int().nonnegative(),
  deletions: z.number().int().nonnegative(),
  changes: z.number().int().nonnegative(),
});

const PullRequestShape = z.object({
  id: z.number({ required_error: "is required" }).int().positive(),
  repoName: z
    .string({ required_error: "is required" })
    .min(1, "must not be empty")
    .regex(REPO_NAME, "must look like owner/repo"),
  title: z.string().default(""),
  body: z.string().nullable().optional(),
  state: z.enum(VALID_STATES, {
    errorMap: () => ({ message: `must be one of ${VALID_STATES.join(", ")}` }),
  }),
  createdAt: z.string().datetime({ offset: true }),
  updatedAt: z.string().datetime({ offset: true }),
  author: z.string(),
  labels: z.array(z.string()).nullable().optional(),
  comments: z.array(z.string()).nullable().optional(),
  reviews: z.array(ReviewSchema).optional(),
  filesChanged: z.array(FileChangeSchema).optional(),
  additions: z.number().int().nonnegative().optional(),
  deletions: z.number().int().nonnegative().optional(),
  changedFiles: z.number().int().nonnegative().optional(),
  baseBranch: z.string().optional(),
  headBranch: z.string().optional(),
  mergeable: z.boolean().nullable().optional(),
});

const PullRequestInputSchema = PullRequestShape.superRefine((pr, ctx) => {
  if (Date.parse(pr.updatedAt) < Date.parse(pr.createdAt)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["updatedAt"],
      message: "cannot be earlier than createdAt",
    });
  }
});

/** Shape of a stored payload, used when reading points back out of the store. */
const PullRequestRecordSchema = PullRequestShape.extend({
  body: z.string(),
  labels: z.array(z.string()),
  comments: z.array(z.string()),
  processedAt: z.string(),
});

function toIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(record)",
    message: issue.message,
  }));
}

function peekId(input: unknown): number | null {
  if (typeof input !== "object" || input === null || !("id" in input)) return null;
  return typeof input.id === "number" ? input.id : null;
}

/**
 * Check an untrusted record. Every offending field is reported in one
 * DataValidationError rather than stopping at the first.
 */
export function validatePullRequest(input: unknown): PullRequestInput {
  const result = PullRequestInputSchema.safeParse(input);
  if (!result.success) throw new DataValidationError(toIssues(result.error), peekId(input));
  return result.data;
}

export function parseStoredRecord(raw: string): PullRequestRecord {
  const parsed: unknown = JSON.parse(raw);
  return PullRequestRecordSchema.parse(parsed);
}
