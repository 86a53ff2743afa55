import type { Request, Response } from 'express';
import { formatISO } from 'date-fns';

import { ok, toApiError } from '../error-normalizer';
import type { DeviceState } from '../state/device-state';

import type { HandlerDeps } from './deps';
import { deviceIndexParam, deviceQuery, parseValuePath, valueQuery } from './schemas';

export function mapDeviceToJson(device: DeviceState, index: number) {
  return {
    index,
    name: device.name,
    fileName: device.fileName,
    type: device.kind,
    description: device.description,
    urlName: device.urlName,
    lastSaveTime: formatISO(device.localLastSaveTime),
    artifacts: [...device.artifacts],
  };
}

export async function handleListDevices(deps: HandlerDeps, _req: Request, res: Response) {
  const devices = deps.coordinator.getStateCollection();
  return res.json(ok(devices.map((device, index) => mapDeviceToJson(device, index))));
}

export async function handleGetDevice(deps: HandlerDeps, req: Request, res: Response) {
  const query = deviceQuery.safeParse(req.query);
  if (!query.success) return res.status(400).json(toApiError('VALIDATION_ERROR', 'Invalid device selection'));

  const selection = deps.coordinator.selectDevice({ index: query.data.state_idx, name: query.data.state_name });
  const device = selection ? deps.coordinator.getStateCollection()[selection.index] : undefined;
  if (!selection || !device) {
    return res.status(404).json(toApiError('NO_DEVICES', 'No device states are available'));
  }
  return res.json(ok({
    index: selection.index,
    nextIndex: selection.nextIndex,
    device: mapDeviceToJson(device, selection.index),
    document: device.document,
  }));
}

export async function handleGetDeviceValue(deps: HandlerDeps, req: Request, res: Response) {
  const params = deviceIndexParam.safeParse(req.params);
  const query = valueQuery.safeParse(req.query);
  if (!params.success || !query.success) {
    return res.status(400).json(toApiError('VALIDATION_ERROR', 'Invalid request'));
  }
  const { index } = params.data;
  if (index >= deps.coordinator.getStateCollection().length) {
    return res.status(404).json(toApiError('NOT_FOUND', `No device at index ${index}`));
  }
  const devicePath = parseValuePath(query.data.path);
  const value = deps.coordinator.getDevice(index, devicePath);
  return res.json(ok({ index, path: devicePath, value: value === undefined ? null : value }));
}
