import cors from 'cors';
import express, { ErrorRequestHandler, Response } from 'express';
import multer from 'multer';
import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { parseExportFormat } from './application/services/ResultExportService.js';
import { StatementUpload } from './domain/entities/StatementUpload.js';
import { AnalysisError, ErrorKind } from './domain/errors/AnalysisErrors.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { componentLogger } from './infrastructure/logging/Logger.js';

const log = componentLogger('http');

const STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  UnsupportedFormatError: 400,
  CorruptInputError: 422,
  SchemaNotFoundError: 422,
  UnparsableRecordError: 422,
  JobNotFoundError: 404,
  UploadNotFoundError: 404,
  DuplicateJobError: 409,
  NotReadyError: 409,
  InvalidStageTransitionError: 409,
  Cancelled: 409,
  ClassifierUnavailableError: 503,
  StageTimeoutError: 504,
};

const UploadFieldsSchema = z.object({
  accountId: z.string().trim().min(1, 'accountId is required'),
  format: z.string().trim().min(1).optional(),
});

const sendError = (res: Response, error: unknown): void => {
  if (error instanceof AnalysisError) {
    res.status(STATUS_BY_KIND[error.kind] ?? 500).json({ error: error.message, kind: error.kind, details: error.details });
    return;
  }

  if (error instanceof z.ZodError) {
    res.status(400).json({ error: error.issues.map((issue) => issue.message).join('; '), kind: 'ValidationError' });
    return;
  }

  log.error({ err: error }, 'unhandled request error');
  res.status(500).json({ error: 'Internal server error', kind: 'InternalError' });
};

const declaredFormatFor = (file: Express.Multer.File, explicit?: string): string =>
  explicit ?? path.extname(file.originalname).slice(1).toLowerCase();

export const createApp = (container: AppContainer): express.Express => {
  const app = express();

  // Statements are kept in memory until a job picks them up.
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: container.config.app.maxUploadBytes },
  });

  const storeUpload = async (file: Express.Multer.File, accountId: string, format: string): Promise<string> => {
    const statement: StatementUpload = {
      id: randomUUID(),
      accountId,
      format,
      byteSize: file.size,
      uploadedAt: new Date().toISOString(),
      fileName: file.originalname,
    };
    await container.objectStorage.putFile(statement, file.buffer);
    return statement.id;
  };

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Statement Analysis API',
      version: '0.1.0',
      classifierConfigured: container.hasClassifier(),
      defaultCurrency: container.config.app.defaultCurrency,
    });
  });

  app.post('/api/statements', upload.single('statement'), async (req, res) => {
    try {
      if (!req.file) {
        res.status(400).json({ error: 'No statement file provided.', kind: 'ValidationError' });
        return;
      }

      const fields = UploadFieldsSchema.parse(req.body);
      const format = declaredFormatFor(req.file, fields.format);
      const uploadId = await storeUpload(req.file, fields.accountId, format);
      const jobId = await container.jobService.submitStatement(uploadId, format);

      res.status(202).json({ jobId, uploadId, statementId: uploadId });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/statements/batch', upload.array('statements'), async (req, res) => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];
      if (!files.length) {
        res.status(400).json({ error: 'No statement files provided.', kind: 'ValidationError' });
        return;
      }

      const fields = UploadFieldsSchema.parse(req.body);
      const submissions: { uploadId: string; declaredFormat: string }[] = [];
      for (const file of files) {
        const declaredFormat = declaredFormatFor(file, fields.format);
        submissions.push({ uploadId: await storeUpload(file, fields.accountId, declaredFormat), declaredFormat });
      }

      res.status(202).json({ jobs: await container.jobService.submitBatch(submissions) });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/jobs/stats', async (req, res) => {
    try {
      res.json(await container.jobService.getJobStatistics());
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/jobs/sweep', async (req, res) => {
    try {
      res.json({ failedJobIds: await container.jobService.sweepStaleJobs() });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/jobs/:jobId', async (req, res) => {
    try {
      res.json(await container.jobService.getJobStatus(req.params.jobId));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/jobs/:jobId/result', async (req, res) => {
    try {
      res.json(await container.jobService.getResult(req.params.jobId));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/jobs/:jobId/cancel', async (req, res) => {
    try {
      res.json(await container.jobService.cancelJob(req.params.jobId));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/jobs/:jobId/export', async (req, res) => {
    try {
      const format = parseExportFormat(typeof req.query.format === 'string' ? req.query.format : 'json');
      const result = await container.jobService.getResult(req.params.jobId);
      const file = container.exportService.exportResult(result, format);

      res.setHeader('Content-Type', file.contentType);
      res.setHeader('Content-Disposition', `attachment; filename="${file.fileName}"`);
      res.send(file.body);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found', kind: 'NotFound' });
  });

  const handleUploadErrors: ErrorRequestHandler = (error, req, res, next) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: error.message, kind: 'ValidationError' });
      return;
    }
    next(error);
  };
  app.use(handleUploadErrors);

  return app;
};

const isEntryPoint = process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
  const container = new AppContainer();
  const app = createApp(container);
  const { port } = container.config.app;

  const sweepTimer = setInterval(() => {
    container.jobService.sweepStaleJobs().catch((error: unknown) => {
      log.error({ err: error }, 'stale job sweep failed');
    });
  }, container.config.pipeline.staleJobAgeMs);
  sweepTimer.unref();

  app.listen(port, () => {
    log.info(
      { port, environment: process.env.NODE_ENV ?? 'development', classifier: container.hasClassifier() },
      'statement analysis API listening',
    );
  });
}
