import type { LifecycleState, TransitionKey } from "./types.js";

export const LIFECYCLE_STATES: readonly LifecycleState[] = [
  "idea",
  "candidate",
  "in_development",
  "review",
  "production_ready",
  "rejected",
];

/**
 * Legal moves. Forward by one step only; "rejected" is reachable from the two
 * pre-commitment states. Not configurable.
 */
const ADJACENCY: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  idea: ["candidate", "rejected"],
  candidate: ["in_development", "rejected"],
  in_development: ["review"],
  review: ["production_ready"],
  production_ready: [],
  rejected: [],
};

export function nextStates(state: LifecycleState): LifecycleState[] {
  return [...ADJACENCY[state]];
}

export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return ADJACENCY[from].includes(to);
}

export function isTerminal(state: LifecycleState): boolean {
  return ADJACENCY[state].length === 0;
}

export function isLifecycleState(value: string): value is LifecycleState {
  return (LIFECYCLE_STATES as readonly string[]).includes(value);
}

export function transitionKey(from: LifecycleState, to: LifecycleState): TransitionKey {
  return `${from}->${to}`;
}

/** Every structurally legal transition key */
export const TRANSITION_KEYS: readonly TransitionKey[] = LIFECYCLE_STATES.flatMap((from) =>
  ADJACENCY[from].map((to) => transitionKey(from, to)),
);

export function isTransitionKey(value: string): value is TransitionKey {
  return (TRANSITION_KEYS as readonly string[]).includes(value);
}
