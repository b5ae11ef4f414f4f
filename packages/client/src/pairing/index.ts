export { PairingSession, type PairingSessionOptions } from './session';
export { approvePairing, type ApprovePairingOptions } from './approve';
export { AccountLinker, type AccountLinkerOptions, type LinkAttempt } from './linker';
export { formatPairingLink, parsePairingLink, PAIRING_LINK_PREFIX, type PairingLinkError } from './link';
export { encodePairingPayload, decodePairingPayload, type PairingPayload } from './payload';
export {
  systemClock,
  TERMINAL_PAIRING_STATES,
  type Clock,
  type PairingState,
  type PairingOutcome,
  type PairingCredentials,
  type PairingFailureReason,
  type PairingStateListener,
} from './types';
