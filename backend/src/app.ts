/**
 * Express app for the STL parse and convert API
 */

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { z } from 'zod';
import type { ParseOptions } from '../../shared/config/options';
import { CountMismatchPolicySchema, resolveParseOptions } from '../../shared/config/options';
import type { ParserRegistry } from '../../shared/parsers/registry';
import { defaultRegistry } from '../../shared/parsers/registry';
import type { Mesh } from '../../shared/types/mesh';
import { MESH_LEVEL_INDEX } from '../../shared/types/mesh';
import type { Result } from '../../shared/utils/result';
import type { ParseError } from '../../shared/parsers/errors';
import { describeParseError } from '../../shared/parsers/errors';
import { parseMesh } from '../../shared/parsers';
import { convertToSTL } from '../../shared/converters';
import type { ServerConfig } from './config';
import { errorBody, meshBody, statusForParseError } from './responses';

const ParseQuerySchema = z.object({
  format: z.string().min(1).optional(),
  countMismatch: CountMismatchPolicySchema.optional(),
});

const ConvertQuerySchema = ParseQuerySchema.extend({
  to: z.enum(['ascii', 'binary']).default('binary'),
});

type UploadedFile = {
  readonly originalname: string;
  readonly buffer: Buffer;
};

const logParseResult = (name: string, result: Result<Mesh, ParseError>): void => {
  if (!result.ok) {
    console.error(`Failed to parse ${name}: ${describeParseError(result.error)}`);
    return;
  }
  const mesh = result.value;
  console.log(`Parsed ${name} as ${mesh.format}: ${mesh.triangleCount} triangles`);
  for (const warning of mesh.warnings) {
    const where = warning.index === MESH_LEVEL_INDEX ? 'file' : `triangle ${warning.index}`;
    console.warn(`  ${name} ${where}: ${warning.kind} (${warning.detail})`);
  }
};

export const createApp = (config: ServerConfig, registry: ParserRegistry = defaultRegistry) => {
  const app = express();

  // Middleware
  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  app.use(express.json());

  // Configure multer for file uploads
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: config.maxUploadBytes,
    },
  });

  const optionsFor = (query: z.infer<typeof ParseQuerySchema>): ParseOptions | undefined => {
    const resolved = resolveParseOptions({
      maxTriangles: config.maxTriangles,
      maxFileSize: config.maxUploadBytes,
      countMismatch: query.countMismatch ?? config.countMismatch,
      format: query.format,
    });
    return resolved.ok ? resolved.value : undefined;
  };

  const parseUpload = (file: UploadedFile, options: ParseOptions): Result<Mesh, ParseError> => {
    const result = parseMesh({ path: file.originalname, bytes: file.buffer }, { registry, options });
    logParseResult(file.originalname, result);
    return result;
  };

  // Health check endpoint
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', formats: registry.formats });
  });

  // Parse an uploaded mesh file
  app.post('/api/parse', upload.single('file'), (req: Request, res: Response) => {
    if (!req.file) {
      return res.status(400).json({ success: false, error: { message: 'No file uploaded' } });
    }

    const query = ParseQuerySchema.safeParse(req.query);
    const options = query.success ? optionsFor(query.data) : undefined;
    if (!options) {
      return res.status(400).json({ success: false, error: { message: 'Invalid query parameters' } });
    }

    const result = parseUpload(req.file, options);
    if (!result.ok) {
      return res.status(statusForParseError(result.error)).json(errorBody(result.error));
    }
    return res.json(meshBody(result.value));
  });

  // Re-encode an uploaded mesh as ASCII or binary STL
  app.post('/api/convert/stl', upload.single('file'), (req: Request, res: Response) => {
    if (!req.file) {
      return res.status(400).json({ success: false, error: { message: 'No file uploaded' } });
    }

    const query = ConvertQuerySchema.safeParse(req.query);
    const options = query.success ? optionsFor(query.data) : undefined;
    if (!query.success || !options) {
      return res.status(400).json({ success: false, error: { message: 'Invalid query parameters' } });
    }

    const result = parseUpload(req.file, options);
    if (!result.ok) {
      return res.status(statusForParseError(result.error)).json(errorBody(result.error));
    }

    const converted = convertToSTL(result.value, query.data.to);
    if (!converted.ok) {
      return res.status(422).json({ success: false, error: converted.error });
    }

    const stem = result.value.name.replace(/\.[^.]*$/, '') || 'converted';
    res.setHeader('Content-Type', 'application/octet-stream');
    res.setHeader('Content-Disposition', `attachment; filename="${stem}.stl"`);
    return res.send(
      typeof converted.value === 'string' ? converted.value : Buffer.from(converted.value)
    );
  });

  // Upload limits and unexpected failures
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
      return res.status(413).json({ success: false, error: { message: err.message } });
    }
    console.error('Unhandled request error:', err);
    return res.status(500).json({
      success: false,
      error: { message: err instanceof Error ? err.message : 'Unknown error' },
    });
  });

  return app;
};
