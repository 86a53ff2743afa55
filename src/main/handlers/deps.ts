import type { ConfigManager } from '../config/config-manager';
import type { Housekeeping } from '../housekeeping';
import type { Logger } from '../logging/logger';
import type { StateCoordinator } from '../state/state-coordinator';

export interface HandlerDeps {
  coordinator: StateCoordinator;
  config: ConfigManager;
  logger: Logger;
  housekeeping: Housekeeping;
}
