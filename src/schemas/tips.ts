import { z } from "zod";

export const TipSnippet = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  text: z.string().min(1),
  tags: z.array(z.string().min(1)).min(1),
});

export const TipCorpus = z.object({
  version: z.string(),
  source: z.string(),
  tips: z.array(TipSnippet).min(1),
});

export type TipSnippetT = z.infer<typeof TipSnippet>;
export type TipCorpusT = z.infer<typeof TipCorpus>;
