import { z } from "zod";

const identifier = z
  .string()
  .min(1)
  .regex(/^\S+$/, "must not contain whitespace");

export const CreateGameBodySchema = z.object({
  host: identifier,
  roundsCount: z.number().int().optional(),
  cluesIntervalSeconds: z.number().int().optional(),
  gridSize: z.number().int().optional(),
});

export const PlayerBodySchema = z.object({
  playerId: identifier,
});

export const PickBodySchema = z.object({
  playerId: identifier,
  wordId: z.string().min(1),
});

export const ConnectQuerySchema = z.object({
  role: z.enum(["host", "player"]),
  identity: identifier,
});

export type ConnectQuery = z.infer<typeof ConnectQuerySchema>;

export const CatalogWordSchema = z.object({
  id: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

export const WordListSchema = z.array(CatalogWordSchema).min(1);

/** Flatten zod issues into `path: message` lines */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}
