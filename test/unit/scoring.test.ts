import { describe, expect, it } from "vitest";
import { NO_AUXILIARY_SIGNALS, riskLevel, WeightedRiskScorer } from "../../src/domain/scoring.js";
import { emptyProfile, emptySanctions, type SanctionsMatch, type SanctionsSection } from "../../src/domain/types.js";

function match(id: string, topics: string[]): SanctionsMatch {
  return {
    source: "opensanctions",
    entityId: id,
    confidence: 0.9,
    matchedName: "Test Entity",
    raw: { schema: "Company", topics, countries: [], datasets: ["test_list"] }
  };
}

function section(...matches: SanctionsMatch[]): SanctionsSection {
  return { hitsCount: matches.length, matches };
}

describe("WeightedRiskScorer", () => {
  const scorer = new WeightedRiskScorer();

  it("reports no indicators for an active company without hits", () => {
    const profile = { ...emptyProfile("NL"), status: "active" as const };
    const r = scorer.score(profile, emptySanctions(), NO_AUXILIARY_SIGNALS);
    expect(r.score).toBe(0);
    expect(r.reasons).toEqual(["no-risk-indicators"]);
    expect(r.provenance).toEqual({
      scorer: "weighted-v1",
      sanctionsHits: 0,
      topicWeight: 0,
      status: "active",
      pepHits: 0,
      uboMissingAndRequired: false,
      recentNameChanges: 0
    });
  });

  it("adds hit count, heaviest topic and status", () => {
    const r = scorer.score(emptyProfile("NL"), section(match("a", ["sanction"]), match("b", ["crime"])), NO_AUXILIARY_SIGNALS);
    expect(r.score).toBe(0.75);
    expect(r.reasons).toEqual(["sanctions-hits:2", "sanctions-topic:sanction", "status:unknown"]);
  });

  it("matches topics by substring and reports the topic as given", () => {
    const profile = { ...emptyProfile("NL"), status: "active" as const };
    const r = scorer.score(profile, section(match("a", ["Role.PEP", "poi"])), NO_AUXILIARY_SIGNALS);
    expect(r.score).toBe(0.4);
    expect(r.reasons).toEqual(["sanctions-hits:1", "sanctions-topic:Role.PEP"]);
  });

  it("scores auxiliary signals", () => {
    const profile = { ...emptyProfile("NL"), status: "dissolved" as const };
    const r = scorer.score(profile, emptySanctions(), { pepHits: 2, uboMissingAndRequired: true, recentNameChanges: 5 });
    expect(r.score).toBe(0.8);
    expect(r.reasons).toEqual(["pep-hits:2", "ubo-incomplete", "status:dissolved", "recent-name-changes:5"]);
  });

  it("caps the score at 1", () => {
    const hits = section(...["a", "b", "c", "d", "e", "f"].map(id => match(id, ["sanction"])));
    const profile = { ...emptyProfile("NL"), status: "dissolved" as const };
    const r = scorer.score(profile, hits, NO_AUXILIARY_SIGNALS);
    expect(r.score).toBe(1);
    expect(r.reasons[0]).toBe("sanctions-hits:6");
  });

  it("is deterministic", () => {
    const hits = section(match("a", ["fin"]));
    const first = scorer.score(emptyProfile("NL"), hits, NO_AUXILIARY_SIGNALS);
    const second = scorer.score(emptyProfile("NL"), hits, NO_AUXILIARY_SIGNALS);
    expect(second).toEqual(first);
    expect(first.score).toBe(0.35);
  });
});

describe("WeightedRiskScorer.scoreSanctions", () => {
  const scorer = new WeightedRiskScorer();

  it("scores hits and topics without company signals", () => {
    const r = scorer.scoreSanctions(section(match("a", ["sanction"]), match("b", ["crime"])));
    expect(r).toEqual({
      score: 0.7,
      reasons: ["sanctions-hits:2", "sanctions-topic:sanction"],
      provenance: { scorer: "weighted-v1", sanctionsHits: 2, topicWeight: 0.4 }
    });
  });

  it("reports no indicators for a clean screening", () => {
    expect(scorer.scoreSanctions(emptySanctions())).toEqual({
      score: 0,
      reasons: ["no-risk-indicators"],
      provenance: { scorer: "weighted-v1", sanctionsHits: 0, topicWeight: 0 }
    });
  });
});

describe("riskLevel", () => {
  it("buckets scores", () => {
    expect([0, 0.24, 0.25, 0.49, 0.5, 0.74, 0.75, 1].map(riskLevel)).toEqual([
      "low",
      "low",
      "medium",
      "medium",
      "high",
      "high",
      "critical",
      "critical"
    ]);
  });
});
