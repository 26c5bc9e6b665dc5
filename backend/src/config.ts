/**
 * Server configuration
 *
 * Loaded from environment variables (and a .env file when present) and
 * validated with zod before the server starts.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { CountMismatchPolicySchema } from '../../shared/config/options';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().optional(),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024), // 10MB
  MAX_TRIANGLES: z.coerce.number().int().positive().default(2_000_000),
  COUNT_MISMATCH: CountMismatchPolicySchema.default('strict'),
});

export type ServerConfig = {
  readonly port: number;
  readonly corsOrigin?: string;
  readonly maxUploadBytes: number;
  readonly maxTriangles: number;
  readonly countMismatch: z.infer<typeof CountMismatchPolicySchema>;
};

export const parseServerConfig = (env: NodeJS.ProcessEnv): ServerConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid server configuration: ${details}`);
  }

  const { PORT, CORS_ORIGIN, MAX_UPLOAD_BYTES, MAX_TRIANGLES, COUNT_MISMATCH } = parsed.data;
  return {
    port: PORT,
    corsOrigin: CORS_ORIGIN,
    maxUploadBytes: MAX_UPLOAD_BYTES,
    maxTriangles: MAX_TRIANGLES,
    countMismatch: COUNT_MISMATCH,
  };
};

export const loadServerConfig = (): ServerConfig => {
  dotenv.config();
  return parseServerConfig(process.env);
};
