export type EndpointCategory = "followers" | "profiles" | "lookup";

export interface QuotaObservation {
  remaining: number;
  resetAt: number; // epoch ms
}

export type QuotaReservation = { ok: true } | { ok: false; waitMs: number };

interface QuotaState {
  remaining: number;
  resetAt: number;
  trialInFlight: boolean;
}

/** How long callers wait while somebody else's trial call is outstanding. */
export const TRIAL_RECHECK_MS = 1000;

/**
 * In-memory rate-limit budget per endpoint category.
 *
 * Nothing is persisted: a fresh tracker assumes zero calls remain and that the
 * window has already reset, so the first reservation is a single trial call
 * whose response headers seed the real budget.
 */
export class QuotaTracker {
  private states = new Map<EndpointCategory, QuotaState>();

  reserve(category: EndpointCategory, now: number): QuotaReservation {
    const state = this.stateOf(category);
    if (state.remaining > 0) {
      state.remaining -= 1;
      return { ok: true };
    }
    if (now >= state.resetAt) {
      if (!state.trialInFlight) {
        state.trialInFlight = true;
        return { ok: true };
      }
      return { ok: false, waitMs: TRIAL_RECHECK_MS };
    }
    return { ok: false, waitMs: state.resetAt - now };
  }

  // The API's own numbers win over local bookkeeping: other tokens or
  // processes may be drawing from the same limit.
  observe(category: EndpointCategory, remaining: number, resetAt: number) {
    const state = this.stateOf(category);
    state.remaining = Math.max(0, Math.floor(remaining));
    state.resetAt = resetAt;
    state.trialInFlight = false;
  }

  settle(category: EndpointCategory, observation?: QuotaObservation) {
    if (observation) {
      this.observe(category, observation.remaining, observation.resetAt);
      return;
    }
    this.stateOf(category).trialInFlight = false;
  }

  snapshot(category: EndpointCategory): Readonly<QuotaState> {
    return { ...this.stateOf(category) };
  }

  private stateOf(category: EndpointCategory): QuotaState {
    let state = this.states.get(category);
    if (!state) {
      state = { remaining: 0, resetAt: 0, trialInFlight: false };
      this.states.set(category, state);
    }
    return state;
  }
}
