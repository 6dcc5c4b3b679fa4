import { z } from "zod";
import { ratingFor, type AuditResult, type Finding } from "../lib/audit-result";
import { document, numbered, section, table } from "../lib/report";
import { checksumScore, percentage } from "../lib/scoring";
import { defineTool } from "../lib/tool-registry";
import { MAX_LIST_ITEMS, requiredText, textList } from "./params";

export const CITATION_THRESHOLD = 65;

export const citationCheckParams = z
  .object({
    brand_name: requiredText,
    topics: textList,
  })
  .strict();

export type CitationCheckParams = z.output<typeof citationCheckParams>;

export type TopicCitation = {
  topic: string;
  cited: boolean;
  likelihood: number;
  rationale: string;
  action: string;
};

export type CitationCheckResult = AuditResult<{
  topics: TopicCitation[];
  citedCount: number;
  totalTopics: number;
}>;

export function assessTopic(brand: string, topic: string): TopicCitation {
  const likelihood = checksumScore(brand + topic);
  const cited = likelihood > CITATION_THRESHOLD;
  return {
    topic,
    cited,
    likelihood,
    rationale: cited
      ? `Sources tying ${brand} to "${topic}" are strong enough for assistants to quote.`
      : `Too few authoritative sources connect ${brand} with "${topic}".`,
    action: cited
      ? "Maintain with fresh content updates"
      : "Create cornerstone content and earn backlinks from authoritative sources",
  };
}

export function citationCheck(params: CitationCheckParams): CitationCheckResult {
  const brand = params.brand_name;
  const topics = params.topics.map((topic) => assessTopic(brand, topic));
  const citedCount = topics.filter((entry) => entry.cited).length;
  const score = percentage(citedCount, topics.length);

  const findings: Finding[] = topics.map((entry) => ({
    observation: `${entry.topic}: ${entry.cited ? "cited" : "not cited"}. ${entry.rationale}`,
    signal: entry.cited ? "cited" : "not_cited",
    evidence: { topic: entry.topic, likelihood: entry.likelihood },
  }));

  const uncited = topics.filter((entry) => !entry.cited).map((entry) => entry.topic);
  const recommendations: string[] = [];
  if (uncited.length > 0) {
    recommendations.push(`Write the definitive guide for: ${uncited.join(", ")}. Use original data or frameworks.`);
    recommendations.push("Earn editorial links from publications assistants already trust.");
  }
  recommendations.push(
    `Repeat your core claims consistently across your site, social profiles and PR.`,
    `Always use the same name format for ${brand}; avoid variations.`,
  );
  if (topics.length === 0) {
    recommendations.unshift("Add the topics you want to be cited for and run the check again.");
  }

  return {
    tool: "citation_check",
    brand,
    score,
    rating: ratingFor(score),
    findings,
    recommendations,
    topics,
    citedCount,
    totalTopics: topics.length,
  };
}

export function renderCitationCheck(result: CitationCheckResult): string {
  return document(`Citation Check: ${result.brand}`, [
    `## Citation Rate: ${result.citedCount}/${result.totalTopics} topics (${result.score}%)`,
    result.topics.length === 0
      ? ""
      : section(
          "Topic-by-Topic Breakdown",
          table(
            ["Topic", "AI Citation Status", "Likelihood", "Recommended Action"],
            result.topics.map((entry) => [entry.topic, entry.cited ? "Cited" : "Not cited", entry.likelihood, entry.action]),
          ),
        ),
    section("How to Improve Citation Rate", numbered(result.recommendations)),
  ]);
}

export const citationCheckTool = defineTool({
  name: "citation_check",
  description:
    "Check how likely AI assistants are to cite a brand as a source for each topic. Returns one judgment per " +
    "topic, in input order, with a rationale and the action to take.",
  inputSchema: {
    type: "object",
    additionalProperties: false,
    required: ["brand_name", "topics"],
    properties: {
      brand_name: { type: "string", minLength: 1, description: "Brand name to check citation status for." },
      topics: {
        type: "array",
        maxItems: MAX_LIST_ITEMS,
        items: { type: "string", minLength: 1 },
        description: "Topics you want to be cited for (e.g. ['pricing', 'support']).",
      },
    },
  },
  params: citationCheckParams,
  handler: citationCheck,
  render: renderCitationCheck,
});
