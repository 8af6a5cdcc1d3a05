/**
 * Declarative rule table for the Analyze stage.
 *
 * Rules are evaluated in order and the first whose condition holds decides
 * the tick. The table is pure: same facts, same decision.
 */

import {
  AdaptationDecision,
  MissionState,
} from "@/shared/constants/MissionEnums";
import type { MonitorFacts } from "../../../types/simulation/mape";

export interface AdaptationRule {
  id: string;
  decision: AdaptationDecision;
  condition: (facts: MonitorFacts) => boolean;
  reason: (facts: MonitorFacts) => string;
}

export interface AdaptationVerdict {
  decision: AdaptationDecision;
  ruleId: string;
  reason: string;
}

function isMoving(facts: MonitorFacts): boolean {
  return (
    facts.missionState === MissionState.ACTIVE ||
    facts.missionState === MissionState.RETURNING
  );
}

function deltaSize(facts: MonitorFacts): number {
  return facts.obstacleDelta.added.length + facts.obstacleDelta.removed.length;
}

// ============================================================================
// MISSION START
// ============================================================================

export const startMissionRule: AdaptationRule = {
  id: "start_mission",
  decision: AdaptationDecision.START_MISSION,
  condition: (facts) =>
    facts.missionState === MissionState.COLLECTING &&
    facts.pendingCount > 0 &&
    (facts.pendingCount >= facts.capacity ||
      facts.elapsedSinceFirstPending >= facts.missionTimeoutMs),
  reason: (facts) =>
    facts.pendingCount >= facts.capacity
      ? `capacity reached (${facts.pendingCount}/${facts.capacity})`
      : `collection window elapsed (${facts.elapsedSinceFirstPending} ms)`,
};

// ============================================================================
// ADAPTATION
// ============================================================================

/**
 * A stuck robot is handled by `enterStuckRule` even when obstacles moved.
 */
export const replanRule: AdaptationRule = {
  id: "replan",
  decision: AdaptationDecision.REPLAN,
  condition: (facts) =>
    isMoving(facts) &&
    !facts.robotStuck &&
    (facts.pathBlocked || facts.offPath || deltaSize(facts) > 0),
  reason: (facts) => {
    if (facts.pathBlocked) return "current leg is blocked";
    if (facts.offPath) return "robot is off its planned path";
    return `obstacle layout changed (${deltaSize(facts)} cell(s))`;
  },
};

export const enterStuckRule: AdaptationRule = {
  id: "enter_stuck",
  decision: AdaptationDecision.ENTER_STUCK,
  condition: (facts) => facts.robotStuck,
  reason: () => "a required target is unreachable",
};

export const resumeRule: AdaptationRule = {
  id: "resume",
  decision: AdaptationDecision.RESUME,
  condition: (facts) =>
    facts.missionState === MissionState.STUCK && facts.pathViable,
  reason: () => "route reachable again",
};

// ============================================================================
// MISSION END
// ============================================================================

export const beginReturnRule: AdaptationRule = {
  id: "begin_return",
  decision: AdaptationDecision.BEGIN_RETURN,
  condition: (facts) =>
    facts.missionState === MissionState.ACTIVE && facts.allDelivered,
  reason: () => "all mission orders delivered",
};

export const completeMissionRule: AdaptationRule = {
  id: "complete_mission",
  decision: AdaptationDecision.COMPLETE_MISSION,
  condition: (facts) =>
    facts.missionState === MissionState.RETURNING && facts.robotAtBase,
  reason: () => "robot back at base",
};

export const ADAPTATION_RULES: readonly AdaptationRule[] = [
  startMissionRule,
  replanRule,
  enterStuckRule,
  resumeRule,
  beginReturnRule,
  completeMissionRule,
];

/**
 * First matching rule wins; NoAction when none match or the facts are not
 * initialised.
 */
export function evaluateRules(
  facts: MonitorFacts,
  rules: readonly AdaptationRule[] = ADAPTATION_RULES,
): AdaptationVerdict {
  if (facts.initialized) {
    for (const rule of rules) {
      if (rule.condition(facts)) {
        return {
          decision: rule.decision,
          ruleId: rule.id,
          reason: rule.reason(facts),
        };
      }
    }
  }
  return {
    decision: AdaptationDecision.NO_ACTION,
    ruleId: "no_action",
    reason: facts.initialized ? "nothing to adapt" : "samples not initialized",
  };
}
