import type { AppConfig } from "../../config/env.js";
import { ValidationError } from "../../shared/errors.js";
import { KeyedMutex } from "../../shared/keyed-mutex.js";
import { createNoopLogger, type Logger } from "../../shared/logger.js";
import { isHighRiskLevel, type RiskLevel } from "../risk-engine/constants.js";
import { InMemoryAnalystExposureStore, type AnalystExposureStore } from "./state-store.js";
import {
  ExposureDenyReasons,
  type AnalystExposureState,
  type ExposureDenyReason,
  type ExposureLimits,
  type SafetyCheckResult
} from "./types.js";

export const DEFAULT_EXPOSURE_LIMITS: Readonly<ExposureLimits> = Object.freeze({
  maxSessionMinutes: 120,
  maxCasesPerSession: 20,
  maxHighRiskPerSession: 5,
  breakMinutes: 15
});

export function exposureLimitsFromConfig(
  config: Pick<
    AppConfig,
    | "exposureMaxSessionMinutes"
    | "exposureMaxCasesPerSession"
    | "exposureMaxHighRiskPerSession"
    | "exposureBreakMinutes"
  >
): ExposureLimits {
  return {
    maxSessionMinutes: config.exposureMaxSessionMinutes,
    maxCasesPerSession: config.exposureMaxCasesPerSession,
    maxHighRiskPerSession: config.exposureMaxHighRiskPerSession,
    breakMinutes: config.exposureBreakMinutes
  };
}

export interface ExposureGuardOptions {
  store?: AnalystExposureStore;
  limits?: Partial<ExposureLimits>;
  now?: () => Date;
  logger?: Logger;
}

const DENY_MESSAGES: Readonly<Record<ExposureDenyReason, string>> = Object.freeze({
  SESSION_DURATION_EXCEEDED: "Maximum session duration exceeded",
  CASE_LIMIT_REACHED: "Maximum cases per session exceeded",
  HIGH_RISK_LIMIT_REACHED: "Maximum high-risk exposures exceeded"
});

function requireAnalystId(analystId: string): string {
  const trimmed = analystId.trim();
  if (trimmed === "") {
    throw new ValidationError("analystId is required", "analystId");
  }
  return trimmed;
}

/**
 * Caps how much high-risk material one analyst reviews per session. Denials
 * are returned as data. Calls for the same analyst run one at a time.
 */
export class ExposureGuard {
  readonly limits: Readonly<ExposureLimits>;

  private readonly store: AnalystExposureStore;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly mutex = new KeyedMutex();

  constructor({
    store = new InMemoryAnalystExposureStore(),
    limits = {},
    now = () => new Date(),
    logger = createNoopLogger()
  }: ExposureGuardOptions = {}) {
    this.store = store;
    this.limits = Object.freeze({ ...DEFAULT_EXPOSURE_LIMITS, ...limits });
    this.now = now;
    this.logger = logger;
  }

  async checkSafety(analystId: string, riskLevel: RiskLevel): Promise<SafetyCheckResult> {
    const id = requireAnalystId(analystId);
    return this.mutex.runExclusive(id, async (): Promise<SafetyCheckResult> => {
      const state = await this.loadOrCreate(id);
      const sessionMinutes = this.sessionMinutes(state);
      const base = {
        analyst_id: id,
        cases_reviewed: state.cases_reviewed,
        high_risk_exposures: state.high_risk_exposures,
        session_duration_minutes: sessionMinutes
      };

      const reason = this.denyReason(state, sessionMinutes, riskLevel);
      if (reason) {
        this.logger.warn("analyst exposure limit reached", {
          analyst_id: id,
          reason,
          risk_level: riskLevel
        });
        return {
          ...base,
          decision: "deny",
          reason,
          message: DENY_MESSAGES[reason],
          recommendation: `Mandatory ${this.limits.breakMinutes}-minute break required`
        };
      }

      return {
        ...base,
        decision: "allow",
        remaining_cases: Math.max(this.limits.maxCasesPerSession - state.cases_reviewed, 0)
      };
    });
  }

  async logExposure(
    analystId: string,
    riskLevel: RiskLevel,
    durationMinutes: number
  ): Promise<AnalystExposureState> {
    const id = requireAnalystId(analystId);
    if (!Number.isFinite(durationMinutes) || durationMinutes < 0) {
      throw new ValidationError(
        "durationMinutes must be a finite non-negative number",
        "durationMinutes"
      );
    }

    return this.mutex.runExclusive(id, async () => {
      const state = await this.loadOrCreate(id);
      const next: AnalystExposureState = {
        ...state,
        cases_reviewed: state.cases_reviewed + 1,
        total_exposure_minutes: state.total_exposure_minutes + durationMinutes,
        high_risk_exposures: state.high_risk_exposures + (isHighRiskLevel(riskLevel) ? 1 : 0)
      };
      await this.store.save(next);
      return next;
    });
  }

  async resetSession(analystId: string): Promise<AnalystExposureState> {
    const id = requireAnalystId(analystId);
    return this.mutex.runExclusive(id, async () => {
      const fresh = this.freshState(id);
      await this.store.save(fresh);
      this.logger.info("analyst session reset", { analyst_id: id });
      return fresh;
    });
  }

  async getState(analystId: string): Promise<AnalystExposureState> {
    const id = requireAnalystId(analystId);
    return this.mutex.runExclusive(id, () => this.loadOrCreate(id));
  }

  private denyReason(
    state: AnalystExposureState,
    sessionMinutes: number,
    riskLevel: RiskLevel
  ): ExposureDenyReason | undefined {
    if (sessionMinutes > this.limits.maxSessionMinutes) {
      return ExposureDenyReasons.SESSION_DURATION_EXCEEDED;
    }
    if (state.cases_reviewed >= this.limits.maxCasesPerSession) {
      return ExposureDenyReasons.CASE_LIMIT_REACHED;
    }
    if (
      isHighRiskLevel(riskLevel) &&
      state.high_risk_exposures >= this.limits.maxHighRiskPerSession
    ) {
      return ExposureDenyReasons.HIGH_RISK_LIMIT_REACHED;
    }
    return undefined;
  }

  private sessionMinutes(state: AnalystExposureState): number {
    const startedMs = Date.parse(state.session_start_utc);
    return Math.max((this.now().getTime() - startedMs) / 60_000, 0);
  }

  private freshState(analystId: string): AnalystExposureState {
    return {
      analyst_id: analystId,
      session_start_utc: this.now().toISOString(),
      cases_reviewed: 0,
      high_risk_exposures: 0,
      total_exposure_minutes: 0
    };
  }

  private async loadOrCreate(analystId: string): Promise<AnalystExposureState> {
    const existing = await this.store.load(analystId);
    if (existing) {
      return existing;
    }
    const created = this.freshState(analystId);
    await this.store.save(created);
    return created;
  }
}
