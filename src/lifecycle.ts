/**
 * Lifecycle State Machine
 *
 *   trading ──GRADUATE [criteria met]──▶ graduated (final)
 *
 * Graduation criteria, all required:
 * - reserves >= liquidity threshold OR market cap >= market cap threshold
 * - holder count >= minimum unique holders
 * - curve age >= minimum age
 * - reserves > 0 (there must be something to migrate)
 *
 * Emergency path: once the curve is EMERGENCY_GRADUATION_AGE_SECONDS old,
 * reserves >= EMERGENCY_GRADUATION_MIN_RESERVES suffice on their own.
 */

import { createMachine } from "xstate";
import { EMERGENCY_GRADUATION_AGE_SECONDS, EMERGENCY_GRADUATION_MIN_RESERVES } from "./constants";
import { CurveError } from "./errors";
import { marketCap } from "./pricing";
import type { CurveConfig, CurveState, LifecyclePhase } from "./types";

export interface GraduationReport {
  met: boolean;
  liquidityMet: boolean;
  marketCapMet: boolean;
  holdersMet: boolean;
  ageMet: boolean;
  /** Lenient time-based path; ignores holders and thresholds */
  emergencyMet: boolean;
  marketCap: bigint;
  holderCount: number;
  ageSeconds: number;
}

interface LifecycleContext {
  symbol: string;
}

type LifecycleEvent = { type: "GRADUATE"; report: GraduationReport };

export function holderCount(state: Pick<CurveState, "balances">): number {
  let count = 0;
  for (const balance of state.balances.values()) {
    if (balance > 0n) count++;
  }
  return count;
}

/**
 * Evaluate every graduation criterion against a (possibly staged) state.
 */
export function evaluateGraduation(
  config: CurveConfig,
  state: CurveState,
  now: number
): GraduationReport {
  const cap = marketCap(state.currentSupply, config);
  const holders = holderCount(state);
  const ageSeconds = Math.max(0, now - state.createdAt);

  const liquidityMet = state.baseReserves >= config.graduationLiquidityThreshold;
  const marketCapMet = cap >= config.graduationMarketCapThreshold;
  const holdersMet = holders >= config.minimumUniqueHolders;
  const ageMet = ageSeconds >= config.minimumAgeSeconds;
  const emergencyMet =
    ageSeconds >= EMERGENCY_GRADUATION_AGE_SECONDS &&
    state.baseReserves >= EMERGENCY_GRADUATION_MIN_RESERVES;
  const regularMet = (liquidityMet || marketCapMet) && holdersMet && ageMet && state.baseReserves > 0n;

  return {
    met: regularMet || emergencyMet,
    liquidityMet,
    marketCapMet,
    holdersMet,
    ageMet,
    emergencyMet,
    marketCap: cap,
    holderCount: holders,
    ageSeconds,
  };
}

export function createLifecycleMachine(symbol: string) {
  return createMachine<LifecycleContext, LifecycleEvent>(
    {
      id: `curve-${symbol}`,
      predictableActionArguments: true,
      initial: "trading",
      context: { symbol },
      states: {
        trading: {
          on: {
            GRADUATE: { target: "graduated", cond: "criteriaMet" },
          },
        },
        graduated: {
          type: "final",
        },
      },
    },
    {
      guards: {
        criteriaMet: (_context, event) => event.report.met,
      },
    }
  );
}

export type LifecycleMachine = ReturnType<typeof createLifecycleMachine>;

/**
 * Phase reached by feeding a GRADUATE event with `report` to the machine.
 */
export function nextPhase(
  machine: LifecycleMachine,
  phase: LifecyclePhase,
  report: GraduationReport
): LifecyclePhase {
  const next = machine.transition(phase, { type: "GRADUATE", report });
  return next.matches("graduated") ? "graduated" : "trading";
}

/**
 * @throws CurveError AlreadyGraduated once the curve has left Trading
 */
export function assertTrading(state: Pick<CurveState, "phase">): void {
  if (state.phase !== "trading") {
    throw new CurveError("AlreadyGraduated", "curve trading has moved to the AMM pool");
  }
}
