import type { Request, Response } from 'express';

import { validateSubmittedDocument } from '../../shared-schemas/device-documents';
import { ok, toApiError } from '../error-normalizer';
import { StateStoreError } from '../state/errors';
import { isPlainObject } from '../utils/json';

import type { HandlerDeps } from './deps';

/**
 * Ingest a device document posted by a controller. The body is JSON, optionally gzip
 * compressed; a valid document is written to the store and the cache refreshed.
 */
export async function handleSubmit(deps: HandlerDeps, req: Request, res: Response) {
  const { coordinator, logger } = deps;

  if (!req.is('application/json')) {
    logger.log('Submit Data: Invalid content type. Expected JSON.', 'warning');
    return res.status(400).json(toApiError('VALIDATION_ERROR', 'Invalid content type. Expected JSON.'));
  }

  // express.json has already parsed, and inflated, the body
  const data: unknown = req.body;
  if (!isPlainObject(data)) {
    return res.status(400).json(toApiError('VALIDATION_ERROR', 'Invalid JSON format. Expected a JSON object.'));
  }

  const validation = validateSubmittedDocument(data);
  if (!validation.ok) {
    logger.log(`Submit Data: ${validation.message}`, 'warning');
    return res.status(400).json(toApiError('VALIDATION_ERROR', validation.message));
  }

  let fileName: string;
  try {
    fileName = await coordinator.saveDeviceState(validation.document);
  } catch (error) {
    if (error instanceof StateStoreError && error.code === 'INVALID_DEVICE_NAME') {
      logger.log(`Submit Data: ${error.message}`, 'warning');
      return res.status(400).json(toApiError('VALIDATION_ERROR', error.message));
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.reportFatalError(`Submit Data: unable to save state for ${validation.deviceName}`, error);
    return res.status(500).json(toApiError('FILE_SYSTEM_ERROR', message));
  }

  logger.log(`Submit Data: received ${validation.stateFileType} state for ${validation.deviceName}`, 'detailed');
  try {
    await deps.housekeeping.run();
  } catch (error) {
    // The document is stored; the next read retries the refresh
    logger.log(`Submit Data: refresh after save failed: ${error instanceof Error ? error.message : String(error)}`, 'warning');
  }

  return res.json(ok({ message: 'Data received and validated successfully.', fileName }));
}
