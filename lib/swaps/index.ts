export { createSwapRequest, type SwapRequestResult } from "./create-swap-request";
export {
  listMySwapRequests,
  listReceivedSwapRequests,
  getSwapRequest,
} from "./read-swap-requests";
export { transitionSwapRequest } from "./transition-swap-request";
export { deleteSwapRequest } from "./delete-swap-request";
export { findResendConflict } from "./resend-policy";
export {
  SWAP_TRANSITIONS,
  checkTransition,
  isTerminalStatus,
  participantRole,
  type ParticipantRole,
  type TransitionCheck,
} from "./state-machine";
export { toSwapRequestView, toSwapRequestViews } from "./swap-request-view";
