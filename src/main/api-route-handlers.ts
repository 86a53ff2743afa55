import type { Request, Response } from 'express';

import type { HandlerDeps } from './handlers/deps';
import * as Status from './handlers/status-handlers';
import * as Devices from './handlers/devices-handlers';
import * as Submit from './handlers/submit-handlers';

export class APIRouteHandlers {
  constructor(private readonly deps: HandlerDeps) {}

  // Health and Status
  async handleHealth(req: Request, res: Response) {
    return Status.handleHealth(this.deps, req, res);
  }

  async handleStatus(req: Request, res: Response) {
    return Status.handleStatus(this.deps, req, res);
  }

  // Devices
  async handleListDevices(req: Request, res: Response) {
    return Devices.handleListDevices(this.deps, req, res);
  }

  async handleGetDevice(req: Request, res: Response) {
    return Devices.handleGetDevice(this.deps, req, res);
  }

  async handleGetDeviceValue(req: Request, res: Response) {
    return Devices.handleGetDeviceValue(this.deps, req, res);
  }

  // Ingestion
  async handleSubmit(req: Request, res: Response) {
    return Submit.handleSubmit(this.deps, req, res);
  }
}
