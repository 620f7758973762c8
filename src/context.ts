import type { Hub } from './hub/hub.js';
import type { SignalingRelay } from './hub/signalingRelay.js';
import type { Logger } from './infrastructure/logger.js';

export interface AppContext {
  hub: Hub;
  relay: SignalingRelay;
  logger: Logger;
}
