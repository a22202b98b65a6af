/**
 * All resolution states, in the order a successful run passes through them.
 */
export const RESOLUTION_STATES = [
  "unresolved",
  "validating",
  "valid",
  "invalid",
  "update_available",
  "resolved",
] as const;

export type ResolutionState = (typeof RESOLUTION_STATES)[number];

/**
 * Events that drive state transitions.
 */
export type ResolutionEvent =
  | "start"
  | "cache_valid"
  | "cache_invalid"
  | "update_found"
  | "updated"
  | "switched"
  | "finish";

const TRANSITIONS: Record<ResolutionState, Partial<Record<ResolutionEvent, ResolutionState>>> = {
  unresolved: { start: "validating" },
  validating: { cache_valid: "valid", cache_invalid: "invalid", update_found: "update_available" },
  valid: { finish: "resolved" },
  // after an update the artifact is validated again
  invalid: { updated: "validating" },
  update_available: { updated: "validating", switched: "validating" },
  resolved: {},
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: ResolutionState,
    readonly event: ResolutionEvent,
  ) {
    super(`Illegal resolution transition: ${event} in state ${from}`);
    this.name = "IllegalTransitionError";
  }
}

/**
 * Pure function: given current state + event, return next state.
 */
export function nextState(current: ResolutionState, event: ResolutionEvent): ResolutionState {
  const next = TRANSITIONS[current][event];
  if (next === undefined) {
    throw new IllegalTransitionError(current, event);
  }
  return next;
}

export function isTerminal(state: ResolutionState): boolean {
  return Object.keys(TRANSITIONS[state]).length === 0;
}
