import type { CompanyProfile, CompanyStatus, RiskLevel, RiskResult, SanctionsSection } from "./types.js";

/** Signals the sources do not provide yet; the orchestrator passes placeholders. */
export type AuxiliarySignals = {
  pepHits: number;
  uboMissingAndRequired: boolean;
  recentNameChanges: number;
};

export const NO_AUXILIARY_SIGNALS: AuxiliarySignals = {
  pepHits: 0,
  uboMissingAndRequired: false,
  recentNameChanges: 0
};

/** Pure and synchronous: the same input always yields the same score and reasons. */
export interface RiskScorer {
  score(profile: CompanyProfile, sanctions: SanctionsSection, signals: AuxiliarySignals): RiskResult;
  // Screening a bare name: only the sanctions evidence counts.
  scoreSanctions(sanctions: SanctionsSection): RiskResult;
}

export function riskLevel(score: number): RiskLevel {
  if (score >= 0.75) return "critical";
  if (score >= 0.5) return "high";
  if (score >= 0.25) return "medium";
  return "low";
}

// Substring of an OpenSanctions topic -> weight. Only the heaviest topic counts.
const TOPIC_WEIGHTS: Array<[string, number]> = [
  ["sanction", 0.4],
  ["crime", 0.3],
  ["role.pep", 0.25],
  ["poi", 0.2],
  ["fin", 0.15]
];

const STATUS_WEIGHTS: Record<CompanyStatus, number> = {
  active: 0,
  unknown: 0.05,
  inactive: 0.1,
  dissolved: 0.2
};

function round(n: number): number {
  return Math.round(n * 10000) / 10000;
}

function heaviestTopic(sanctions: SanctionsSection): { topic: string; weight: number } | null {
  let best: { topic: string; weight: number } | null = null;
  for (const m of sanctions.matches) {
    for (const topic of m.raw.topics) {
      const t = topic.toLowerCase();
      for (const [needle, weight] of TOPIC_WEIGHTS) {
        if (t.includes(needle) && (!best || weight > best.weight)) best = { topic, weight };
      }
    }
  }
  return best;
}

function sanctionsEvidence(sanctions: SanctionsSection, reasons: string[]) {
  let score = 0;
  if (sanctions.hitsCount > 0) {
    score += Math.min(sanctions.hitsCount * 0.15, 0.6);
    reasons.push(`sanctions-hits:${sanctions.hitsCount}`);
  }

  const topic = heaviestTopic(sanctions);
  if (topic) {
    score += topic.weight;
    reasons.push(`sanctions-topic:${topic.topic}`);
  }
  return { score, topicWeight: topic?.weight ?? 0 };
}

export class WeightedRiskScorer implements RiskScorer {
  readonly version = "weighted-v1";

  scoreSanctions(sanctions: SanctionsSection): RiskResult {
    const reasons: string[] = [];
    const evidence = sanctionsEvidence(sanctions, reasons);
    if (!reasons.length) reasons.push("no-risk-indicators");
    return {
      score: round(Math.min(1, evidence.score)),
      reasons,
      provenance: {
        scorer: this.version,
        sanctionsHits: sanctions.hitsCount,
        topicWeight: evidence.topicWeight
      }
    };
  }

  score(profile: CompanyProfile, sanctions: SanctionsSection, signals: AuxiliarySignals): RiskResult {
    const reasons: string[] = [];
    const evidence = sanctionsEvidence(sanctions, reasons);
    let score = evidence.score;

    if (signals.pepHits > 0) {
      score += 0.25;
      reasons.push(`pep-hits:${signals.pepHits}`);
    }

    if (signals.uboMissingAndRequired) {
      score += 0.2;
      reasons.push("ubo-incomplete");
    }

    const statusWeight = STATUS_WEIGHTS[profile.status];
    if (statusWeight > 0) {
      score += statusWeight;
      reasons.push(`status:${profile.status}`);
    }

    if (signals.recentNameChanges > 0) {
      score += Math.min(signals.recentNameChanges * 0.05, 0.15);
      reasons.push(`recent-name-changes:${signals.recentNameChanges}`);
    }

    if (!reasons.length) reasons.push("no-risk-indicators");

    return {
      score: round(Math.min(1, score)),
      reasons,
      provenance: {
        scorer: this.version,
        sanctionsHits: sanctions.hitsCount,
        topicWeight: evidence.topicWeight,
        status: profile.status,
        pepHits: signals.pepHits,
        uboMissingAndRequired: signals.uboMissingAndRequired,
        recentNameChanges: signals.recentNameChanges
      }
    };
  }
}
