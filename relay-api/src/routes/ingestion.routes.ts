import type { FastifyInstance } from 'fastify';

import {
  createIngestionController,
  type IngestionControllerDependencies,
} from '../controllers/ingestion.controller.js';

export const INGESTION_BODY_LIMIT_BYTES = 1024 * 1024;

export async function registerIngestionRoutes(
  app: FastifyInstance,
  options: IngestionControllerDependencies,
): Promise<void> {
  app.post(
    '/events',
    {
      bodyLimit: INGESTION_BODY_LIMIT_BYTES,
    },
    createIngestionController(options),
  );
}
