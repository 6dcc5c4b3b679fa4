import { z } from "zod";
import { ratingFor, ratingLabel, type AuditResult, type Finding } from "../lib/audit-result";
import { bullets, document, numbered, section, table } from "../lib/report";
import { checksumScore, distinct, LEXICON, tokenize } from "../lib/scoring";
import { defineTool } from "../lib/tool-registry";
import { optionalText, requiredText } from "./params";

export const brandPerceptionParams = z
  .object({
    brand_name: requiredText,
    industry: requiredText,
    website: optionalText,
  })
  .strict();

export type BrandPerceptionParams = z.output<typeof brandPerceptionParams>;

export type PerceptionSubscores = {
  visibility: number;
  categoryClarity: number;
  trust: number;
};

export type BrandPerceptionResult = AuditResult<{
  industry: string;
  website: string | null;
  subscores: PerceptionSubscores;
  testPrompts: string[];
}>;

/** Industry words that narrow the category; stock words like "agency" do not count. */
export function descriptiveTerms(industry: string): string[] {
  return distinct(tokenize(industry).filter((word) => !LEXICON.genericIndustryTerms.has(word)));
}

export function categoryClarityScore(industry: string): number {
  return Math.min(100, 30 + 20 * descriptiveTerms(industry).length);
}

export function trustScore(website: string | null): number {
  if (website === null) {
    return 25;
  }
  return /^https:\/\//i.test(website) ? 70 : 55;
}

function authorityStatus(visibility: number): string {
  if (visibility > 70) {
    return "established";
  }
  return visibility > 55 ? "needs strengthening" : "weak";
}

function clarityStatus(categoryClarity: number): string {
  if (categoryClarity >= 70) {
    return "clear";
  }
  return categoryClarity >= 50 ? "partially clear" : "unclear";
}

export function brandPerceptionAudit(params: BrandPerceptionParams): BrandPerceptionResult {
  const brand = params.brand_name;
  const industry = params.industry;
  const website = params.website ?? null;

  const terms = descriptiveTerms(industry);
  const subscores: PerceptionSubscores = {
    visibility: checksumScore(brand + industry),
    categoryClarity: categoryClarityScore(industry),
    trust: trustScore(website),
  };
  const score = Math.round((subscores.visibility + subscores.categoryClarity + subscores.trust) / 3);
  const rating = ratingFor(score);

  const findings: Finding[] = [
    {
      observation: `Authority tone in the ${industry} space is ${authorityStatus(subscores.visibility)}.`,
      signal: "authority_tone",
      evidence: { visibility: subscores.visibility },
    },
    {
      observation:
        terms.length === 0
          ? `"${industry}" reads as generic category language; assistants will describe ${brand} by function only.`
          : `Category placement is ${clarityStatus(subscores.categoryClarity)} from ${terms.length} distinguishing term(s).`,
      signal: "category_clarity",
      evidence: { categoryClarity: subscores.categoryClarity, terms: terms.join(", ") },
    },
    {
      observation:
        website === null
          ? "No website supplied, so there is no owned source to anchor trust signals."
          : subscores.trust === 70
            ? `Owned source ${website} can anchor trust signals.`
            : `Owned source ${website} is not served over https.`,
      signal: "trust_indicators",
      evidence: { trust: subscores.trust, hasWebsite: website !== null },
    },
    {
      observation:
        rating === "strong"
          ? `${brand} shows an emerging unique position.`
          : `Unique positioning for ${brand} is not yet established; it likely appears as a niche player rather than a category authority.`,
      signal: "unique_positioning",
      evidence: { score },
    },
  ];

  const recommendations = [
    "Publish structured FAQ content covering the test prompts below.",
    `Get ${brand} cited in roundup articles on authoritative ${industry} sites.`,
    website === null
      ? "Add Organization and FAQ schema markup to your website."
      : `Add Organization and FAQ schema markup to ${website}.`,
    `Create an llms.txt file at your domain root listing key facts about ${brand}.`,
  ];
  if (terms.length < 2) {
    recommendations.push(`Describe the category more specifically than "${industry}" everywhere ${brand} is listed.`);
  }
  if (website !== null && subscores.trust < 70) {
    recommendations.push(`Serve ${website} over https.`);
  }
  recommendations.push(`Run citation_check to see which topics ${brand} needs content for.`);

  return {
    tool: "brand_perception_audit",
    brand,
    score,
    rating,
    findings,
    recommendations,
    industry,
    website,
    subscores,
    testPrompts: [
      `Who are the best ${industry} companies?`,
      `What do people say about ${brand}?`,
      `Is ${brand} a good choice for ${industry}?`,
    ],
  };
}

export function renderBrandPerception(result: BrandPerceptionResult): string {
  return document(`Brand Perception Audit: ${result.brand}`, [
    `## Overall AI Perception Score: ${result.score}/100 (${ratingLabel(result.rating)})`,
    section(
      "Perception Signals",
      table(
        ["Signal", "Observation"],
        result.findings.map((finding) => [finding.signal ?? "", finding.observation]),
      ),
    ),
    section(
      "Sub-scores",
      bullets([
        `Visibility: ${result.subscores.visibility}/100`,
        `Category clarity: ${result.subscores.categoryClarity}/100`,
        `Trust: ${result.subscores.trust}/100`,
      ]),
    ),
    section("Prompts to Test Your AI Presence", numbered(result.testPrompts.map((prompt) => `\`${prompt}\``))),
    section("Quick Wins", numbered(result.recommendations)),
  ]);
}

export const brandPerceptionTool = defineTool({
  name: "brand_perception_audit",
  description:
    "Analyze how AI assistants are likely to perceive and describe a brand. Returns a perception score, " +
    "signals covering tone, category placement and trust, and prompts to test your own AI presence.",
  inputSchema: {
    type: "object",
    additionalProperties: false,
    required: ["brand_name", "industry"],
    properties: {
      brand_name: { type: "string", minLength: 1, description: "The brand or company name to audit." },
      industry: { type: "string", minLength: 1, description: "Industry or category (e.g. 'SEO agency', 'SaaS')." },
      website: { type: "string", description: "Brand website URL (optional)." },
    },
  },
  params: brandPerceptionParams,
  handler: brandPerceptionAudit,
  render: renderBrandPerception,
});
