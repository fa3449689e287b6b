import type { AnalystExposureState } from "./types.js";

export interface AnalystExposureStore {
  load(analystId: string): Promise<AnalystExposureState | undefined>;
  save(state: AnalystExposureState): Promise<void>;
}

/** Process-local store; state is lost on restart. */
export class InMemoryAnalystExposureStore implements AnalystExposureStore {
  private readonly states = new Map<string, AnalystExposureState>();

  async load(analystId: string): Promise<AnalystExposureState | undefined> {
    const state = this.states.get(analystId);
    return state ? { ...state } : undefined;
  }

  async save(state: AnalystExposureState): Promise<void> {
    this.states.set(state.analyst_id, { ...state });
  }
}
