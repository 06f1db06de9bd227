import { z } from 'zod';

export const relevanceGradeSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const relevanceJudgmentSchema = z.object({
  query: z.string().min(1),
  docId: z.string().min(1),
  relevance: relevanceGradeSchema.nullable(),
  labeledBy: z.string(),
  labeledAt: z.string(),
  notes: z.string(),
});
