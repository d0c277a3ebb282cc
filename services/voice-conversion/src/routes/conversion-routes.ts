import { Router, type Request, type Response, type Router as ExpressRouter } from 'express';
import multer from 'multer';
import { createLogger } from '@timbre/core';
import type { UploadedAudio } from '../audio/audio-resolver';
import type { ConversionUploads, VoiceConversionService } from '../pipeline/conversion-service';
import type { ConversionJob } from '../scheduler/conversion-job';

const logger = createLogger('conversion-routes');

export interface ConversionRouterOptions {
  maxUploadBytes: number;
}

type UploadedFiles = Request['files'];

function firstFile(files: UploadedFiles, field: string): UploadedAudio | undefined {
  if (!files || Array.isArray(files)) {
    return undefined;
  }
  const file = files[field]?.[0];
  return file ? { buffer: file.buffer, originalname: file.originalname, mimetype: file.mimetype } : undefined;
}

/**
 * Conversion endpoints: JSON and multipart submission, job control, artifacts
 */
export function createConversionRouter(
  service: VoiceConversionService,
  options: ConversionRouterOptions
): ExpressRouter {
  const router: ExpressRouter = Router();

  // Uploads stay in memory; the resolver decodes straight from the buffer
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.maxUploadBytes,
      files: 2
    }
  });

  /**
   * Run a conversion and cancel it if the client goes away while it is queued
   */
  async function runConversion(req: Request, res: Response, uploads: ConversionUploads) {
    let job: ConversionJob | undefined;

    res.on('close', () => {
      if (job && !res.writableFinished && job.state === 'queued') {
        logger.info({ jobId: job.id }, 'Client disconnected, cancelling queued job');
        service.cancel(job.id);
      }
    });

    const outcome = await service.convert(req.body, uploads, {
      onJob: created => {
        job = created;
      }
    });

    if (!res.headersSent && !res.destroyed) {
      res.status(outcome.statusCode).json(outcome.body);
    }
  }

  /**
   * POST /convert
   * Paths or base64 audio in a JSON body
   */
  router.post('/convert', async (req, res, next) => {
    try {
      await runConversion(req, res, {});
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /convert/files
   * Multipart upload of source and reference audio
   */
  router.post(
    '/convert/files',
    upload.fields([
      { name: 'source_audio', maxCount: 1 },
      { name: 'target_audio', maxCount: 1 }
    ]),
    async (req, res, next) => {
      try {
        await runConversion(req, res, {
          source: firstFile(req.files, 'source_audio'),
          target: firstFile(req.files, 'target_audio')
        });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /jobs/:id
   * Progress of an in-flight or recently finished job
   */
  router.get('/jobs/:id', (req, res) => {
    const progress = service.progress(req.params.id);

    if (!progress) {
      return res.status(404).json({ error: 'Job not found' });
    }
    res.json(progress);
  });

  /**
   * GET /jobs/:id/stream
   * Converted audio available so far, as WAV
   */
  router.get('/jobs/:id/stream', (req, res) => {
    const preview = service.streamingPreview(req.params.id);

    if (!preview) {
      return res.status(404).json({ error: 'Job not found or no longer running' });
    }
    res.type('audio/wav').send(preview);
  });

  /**
   * DELETE /jobs/:id
   * Cancel a queued job
   */
  router.delete('/jobs/:id', (req, res) => {
    const jobId = req.params.id;
    const progress = service.progress(jobId);

    if (!progress) {
      return res.status(404).json({ error: 'Job not found' });
    }

    if (!service.cancel(jobId)) {
      return res.status(409).json({
        error: `Job is ${progress.state} and can no longer be cancelled`,
        state: progress.state
      });
    }

    res.json({ job_id: jobId, cancelled: true });
  });

  /**
   * GET /download/:jobId/:file
   * Fetch a retained artifact
   */
  router.get('/download/:jobId/:file', async (req, res, next) => {
    try {
      const { jobId, file } = req.params;
      const filePath = await service.locateArtifact(jobId, file);

      if (!filePath) {
        return res.status(404).json({ error: 'File not found' });
      }
      res.sendFile(filePath);
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /cleanup/:jobId
   * Release a job's retained artifacts
   */
  router.delete('/cleanup/:jobId', async (req, res, next) => {
    try {
      const { jobId } = req.params;
      const removed = await service.cleanup(jobId);

      if (!removed) {
        return res.status(404).json({ error: 'Job not found' });
      }
      res.json({ message: `Cleaned up job ${jobId}` });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
