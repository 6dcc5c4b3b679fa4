import { z } from "zod";
import { ratingFor, ratingLabel, type AuditResult, type Finding, type Rating } from "../lib/audit-result";
import { document, numbered, section, table } from "../lib/report";
import { checksumScore, sameName } from "../lib/scoring";
import { defineTool } from "../lib/tool-registry";
import { MAX_LIST_ITEMS, requiredText, textList } from "./params";

export const competitorComparisonParams = z
  .object({
    brand_name: requiredText,
    competitors: textList,
    category: requiredText,
  })
  .strict();

export type CompetitorComparisonParams = z.output<typeof competitorComparisonParams>;

export type RankedEntry = {
  rank: number;
  name: string;
  score: number;
  strength: Rating;
  isBrand: boolean;
  rationale: string;
};

export type CompetitorComparisonResult = AuditResult<{
  category: string;
  ranking: RankedEntry[];
  leader: { name: string; score: number } | null;
  gap: number;
  testPrompt: string;
}>;

/** Higher score first; equal scores fall back to ascending code-unit order of the name. */
export function compareEntries(a: { name: string; score: number }, b: { name: string; score: number }): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

function relation(entryScore: number, brandScore: number): string {
  if (entryScore === brandScore) {
    return "level with you";
  }
  const delta = Math.abs(entryScore - brandScore);
  return entryScore > brandScore ? `ahead of you by ${delta} points` : `behind you by ${delta} points`;
}

export function competitorComparison(params: CompetitorComparisonParams): CompetitorComparisonResult {
  const brand = params.brand_name;
  const category = params.category;
  const brandScore = checksumScore(brand + category);

  const kept: string[] = [];
  const dropped: string[] = [];
  for (const name of params.competitors) {
    if (sameName(name, brand) || kept.some((existing) => sameName(existing, name))) {
      dropped.push(name);
      continue;
    }
    kept.push(name);
  }

  const scored = [
    { name: brand, score: brandScore, isBrand: true },
    ...kept.map((name) => ({ name, score: checksumScore(name + category), isBrand: false })),
  ].sort(compareEntries);

  const ranking: RankedEntry[] = scored.map((entry, index) => {
    const strength = ratingFor(entry.score);
    return {
      rank: index + 1,
      name: entry.name,
      score: entry.score,
      strength,
      isBrand: entry.isBrand,
      rationale: entry.isBrand
        ? `${entry.name} (you) scores ${entry.score}/100 for ${category}: ${ratingLabel(strength).toLowerCase()} visibility.`
        : `${entry.name} scores ${entry.score}/100 for ${category}, ${relation(entry.score, brandScore)}.`,
    };
  });

  const leaderEntry = ranking.find((entry) => !entry.isBrand) ?? null;
  const leader = leaderEntry ? { name: leaderEntry.name, score: leaderEntry.score } : null;
  const gap = leader ? Math.max(0, leader.score - brandScore) : 0;
  const brandRank = ranking.find((entry) => entry.isBrand)?.rank ?? 1;

  const findings: Finding[] = [
    {
      observation: `${brand} ranks ${brandRank} of ${ranking.length} for ${category}.`,
      signal: "brand_position",
      evidence: { rank: brandRank, entries: ranking.length, score: brandScore },
    },
  ];
  if (leader) {
    findings.push({
      observation:
        gap > 0
          ? `${leader.name} is winning AI mindshare with ${leader.score}/100; the gap to close is ${gap} points.`
          : `${brand} is at or above every competitor; the strongest competitor is ${leader.name} with ${leader.score}/100.`,
      signal: "leader",
      evidence: { leader: leader.name, leaderScore: leader.score, gap },
    });
  }
  if (dropped.length > 0) {
    findings.push({
      observation: `Ignored duplicate competitor entries: ${dropped.join(", ")}.`,
      signal: "duplicates_dropped",
      evidence: { dropped: dropped.length },
    });
  }

  const target = leader && gap > 0 ? leader.name : "the strongest competitor";
  const recommendations = [
    `Audit ${target}'s content strategy: which ${category} topics are they owning that you are not?`,
    "Target citation gaps: topics where nobody has the definitive answer yet.",
    `Build brand mentions at the same publication tier ${target} is cited in.`,
    "Start now; AI visibility compounds.",
  ];

  return {
    tool: "competitor_comparison",
    brand,
    score: brandScore,
    rating: ratingFor(brandScore),
    findings,
    recommendations,
    category,
    ranking,
    leader,
    gap,
    testPrompt: `Compare ${brand} vs ${kept[0] ?? "competitors"} for ${category}`,
  };
}

export function renderCompetitorComparison(result: CompetitorComparisonResult): string {
  return document(`Competitor AI Visibility Comparison: ${result.category}`, [
    `## ${result.brand} AI Visibility Score: ${result.score}/100`,
    section(
      "Ranking",
      table(
        ["Rank", "Brand", "AI Score", "Strength"],
        result.ranking.map((entry) => [
          entry.rank,
          entry.isBrand ? `**${entry.name} (you)**` : entry.name,
          `${entry.score}/100`,
          ratingLabel(entry.strength),
        ]),
      ),
    ),
    section(
      "Gap Analysis",
      result.leader
        ? `**AI Visibility Leader:** ${result.leader.name} (${result.leader.score}/100)\n**Gap to close:** ${result.gap} points`
        : "No competitors to compare against.",
    ),
    section("Your Roadmap to Overtake in AI", numbered(result.recommendations)),
    section("Test It Yourself", `Ask an assistant: \`${result.testPrompt}\``),
  ]);
}

export const competitorComparisonTool = defineTool({
  name: "competitor_comparison",
  description:
    "Compare a brand's likely AI visibility against competitors in a category. Returns a ranking (score " +
    "descending, ties by name), the leader, the gap to close, and a roadmap.",
  inputSchema: {
    type: "object",
    additionalProperties: false,
    required: ["brand_name", "competitors", "category"],
    properties: {
      brand_name: { type: "string", minLength: 1, description: "Your brand name." },
      competitors: {
        type: "array",
        maxItems: MAX_LIST_ITEMS,
        items: { type: "string", minLength: 1 },
        description: "Competitor brand names to compare against.",
      },
      category: { type: "string", minLength: 1, description: "The market category or service type being compared." },
    },
  },
  params: competitorComparisonParams,
  handler: competitorComparison,
  render: renderCompetitorComparison,
});
