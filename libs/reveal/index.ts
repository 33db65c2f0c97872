/**
 * Reveal lifecycle public exports.
 */

export type {
    DecryptionRequest,
    RequestStatus,
    TerminalStatus,
    RevealedStatistic,
    RequestStatusView,
    PublicStatistic,
    RevealOutcome
} from './types.js';
export { isTerminal } from './types.js';

export type { RevealSettings } from './context.js';
export { DEFAULT_REVEAL_SETTINGS } from './context.js';

export type { RevealEventMap, RevealEventName, RevealEvent, RevealEventListener } from './events.js';
export { RevealEventBus } from './events.js';

export { computeObfuscatedAverage, deriveNoise, NoiseEpoch } from './obfuscation.js';
export type { RevealDependencies } from './RevealCoordinator.js';
export { RevealCoordinator } from './RevealCoordinator.js';
