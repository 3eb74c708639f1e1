import { z } from "zod";

export const editSchema = z.object({
  id: z.string().min(1),
  expiryTimeSeconds: z.string().optional(),
});

const localizedTextSchema = z.object({
  language: z.string(),
  text: z.string(),
});

export const trackReleaseSchema = z.object({
  name: z.string().optional(),
  status: z.string(),
  userFraction: z.number().optional(),
  versionCodes: z.array(z.string()).optional(),
  releaseNotes: z.array(localizedTextSchema).optional(),
});

export const trackSchema = z.object({
  track: z.string(),
  releases: z.array(trackReleaseSchema).optional(),
});
