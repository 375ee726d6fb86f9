import type { TransportError } from "./errors";
import type { RetryPolicy } from "./retry";
import type { ProbeResponse } from "./types";

export type HostTaskState =
  | { status: "pending"; attempt: 0 }
  | { status: "fetching"; attempt: number }
  | { status: "retry_wait"; attempt: number; retryAfterMs: number; lastError: TransportError }
  | { status: "succeeded"; attempt: number; response: ProbeResponse }
  | { status: "failed"; attempt: number; error: TransportError }
  | { status: "cancelled"; attempt: number };

export type HostTaskEvent =
  | { type: "start" }
  | { type: "fetch_succeeded"; response: ProbeResponse }
  | { type: "fetch_failed"; error: TransportError }
  | { type: "wait_elapsed" }
  | { type: "cancel" };

export type TerminalHostTaskState = Extract<HostTaskState, { status: "succeeded" | "failed" | "cancelled" }>;

export class InvalidTransitionError extends Error {
  constructor(state: HostTaskState, event: HostTaskEvent) {
    super(`Cannot apply ${event.type} while ${state.status}`);
    this.name = "InvalidTransitionError";
  }
}

export const initialHostTaskState = (): HostTaskState => ({ status: "pending", attempt: 0 });

export const isTerminal = (state: HostTaskState): state is TerminalHostTaskState =>
  state.status === "succeeded" || state.status === "failed" || state.status === "cancelled";

/**
 * Pending → Fetching → (Succeeded | RetryWait → Fetching | Failed).
 * Pure: every retry decision comes from `policy`.
 */
export const transition = (state: HostTaskState, event: HostTaskEvent, policy: RetryPolicy): HostTaskState => {
  if (event.type === "cancel" && !isTerminal(state)) {
    return { status: "cancelled", attempt: state.attempt };
  }

  switch (state.status) {
    case "pending":
      if (event.type === "start") return { status: "fetching", attempt: 1 };
      break;
    case "fetching":
      if (event.type === "fetch_succeeded") {
        return { status: "succeeded", attempt: state.attempt, response: event.response };
      }
      if (event.type === "fetch_failed") {
        const decision = policy.shouldRetry(state.attempt, event.error);
        if (decision.retry) {
          return {
            status: "retry_wait",
            attempt: state.attempt,
            retryAfterMs: decision.retryAfterMs,
            lastError: event.error,
          };
        }
        return { status: "failed", attempt: state.attempt, error: event.error };
      }
      break;
    case "retry_wait":
      if (event.type === "wait_elapsed") return { status: "fetching", attempt: state.attempt + 1 };
      break;
    default:
      break;
  }

  throw new InvalidTransitionError(state, event);
};
