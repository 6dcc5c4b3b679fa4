import { z } from "zod";
import { ratingFor, ratingLabel, type AuditResult, type Finding } from "../lib/audit-result";
import { bullets, document, section } from "../lib/report";
import { checksumScore, clamp, distinct, LEXICON, tokenize } from "../lib/scoring";
import { defineTool } from "../lib/tool-registry";
import { optionalText, requiredText } from "./params";

export const entityClarityParams = z
  .object({
    brand_name: requiredText,
    tagline_or_description: optionalText,
  })
  .strict();

export type EntityClarityParams = z.output<typeof entityClarityParams>;

export type ClarityComponents = {
  nameScore: number;
  descriptionScore: number;
  wordCount: number;
  namesAudience: boolean;
  namesAction: boolean;
  namesCategory: boolean;
  selfReference: boolean;
  vagueTerms: string[];
};

export type EntityClarityResult = AuditResult<{
  description: string | null;
  components: ClarityComponents;
  priorityFix: string;
}>;

const VAGUE_PENALTY = 10;
const MAX_VAGUE_PENALTY = 30;

function lengthPoints(wordCount: number): number {
  if (wordCount >= 5 && wordCount <= 30) {
    return 25;
  }
  return wordCount >= 3 ? 15 : 5;
}

/**
 * Scores a self-description out of 100: base 10, length band up to 25,
 * 20 each for naming an audience, an action and a category, 5 for naming
 * the brand, minus 10 per distinct vague term (at most 30).
 */
export function scoreDescription(brand: string, description: string | null): ClarityComponents {
  const nameScore = checksumScore(brand);
  if (description === null) {
    return {
      nameScore,
      descriptionScore: 0,
      wordCount: 0,
      namesAudience: false,
      namesAction: false,
      namesCategory: false,
      selfReference: false,
      vagueTerms: [],
    };
  }

  const words = tokenize(description);
  const namesAudience = words.some((word) => LEXICON.audienceMarkers.has(word));
  const namesAction = words.some((word) => LEXICON.actionVerbs.has(word));
  const namesCategory = words.some((word) => LEXICON.categoryNouns.has(word));
  const selfReference = description.toLowerCase().includes(brand.toLowerCase());
  const vagueTerms = distinct(words.filter((word) => LEXICON.vagueTerms.has(word)));

  const raw =
    10 +
    lengthPoints(words.length) +
    (namesAudience ? 20 : 0) +
    (namesAction ? 20 : 0) +
    (namesCategory ? 20 : 0) +
    (selfReference ? 5 : 0) -
    Math.min(MAX_VAGUE_PENALTY, VAGUE_PENALTY * vagueTerms.length);

  return {
    nameScore,
    descriptionScore: clamp(raw, 0, 100),
    wordCount: words.length,
    namesAudience,
    namesAction,
    namesCategory,
    selfReference,
    vagueTerms,
  };
}

function priorityFixFor(brand: string, score: number): string {
  if (score > 75) {
    return "Your entity is reasonably clear. Focus on expanding citation breadth.";
  }
  if (score > 55) {
    return "Standardize your brand description across all web properties: pick one or two sentences and use them everywhere.";
  }
  return `${brand} needs a consistent, explicit definition on your homepage, About page and all social profiles.`;
}

export function entityClarityScore(params: EntityClarityParams): EntityClarityResult {
  const brand = params.brand_name;
  const description = params.tagline_or_description ?? null;
  const components = scoreDescription(brand, description);
  // 0.4 name + 0.6 description, kept in integers
  const score = clamp(Math.round((2 * components.nameScore + 3 * components.descriptionScore) / 5), 0, 100);
  const rating = ratingFor(score);

  const findings: Finding[] = [
    {
      observation: `Assistants are likely to give a ${
        rating === "strong" ? "detailed and accurate" : rating === "moderate" ? "partially accurate but generic" : "vague or uncertain"
      } description of ${brand}.`,
      signal: "entity_recognition",
      evidence: { nameScore: components.nameScore, descriptionScore: components.descriptionScore },
    },
  ];

  if (description === null) {
    findings.push({
      observation: "No self-description supplied; nothing anchors what the brand does or who it serves.",
      signal: "missing_description",
    });
  } else {
    if (!components.namesAction || !components.namesCategory) {
      findings.push({
        observation: "The description does not state plainly what the brand does.",
        signal: "missing_what",
        evidence: { namesAction: components.namesAction, namesCategory: components.namesCategory },
      });
    }
    if (!components.namesAudience) {
      findings.push({ observation: "The description does not say who the brand serves.", signal: "missing_audience" });
    }
    if (components.vagueTerms.length > 0) {
      findings.push({
        observation: `Vague wording weakens the entity: ${components.vagueTerms.join(", ")}.`,
        signal: "vague_language",
        evidence: { vagueTerms: components.vagueTerms.length },
      });
    }
  }

  const recommendations = [
    `Always write the name as "${brand}"; never vary spelling or abbreviation.`,
    "State on your About page what you do, who you serve, where you are based and when you were founded.",
    "Add Organization schema with @id, name, url, description and founder.",
    "Keep Crunchbase, LinkedIn and similar company profiles complete and consistent.",
    "Add /.well-known/llms.txt with structured brand facts.",
  ];
  if (description !== null && !components.namesAudience) {
    recommendations.unshift("Name your audience in the tagline (e.g. \"for small agencies\").");
  }

  return {
    tool: "entity_clarity_score",
    brand,
    score,
    rating,
    findings,
    recommendations,
    description,
    components,
    priorityFix: priorityFixFor(brand, score),
  };
}

export function renderEntityClarity(result: EntityClarityResult): string {
  return document(`Entity Clarity Score: ${result.brand}`, [
    `## Entity Clarity Score: ${result.score}/100 (${ratingLabel(result.rating)})`,
    section("What You Say", result.description === null ? "_No description provided._" : `*"${result.description}"*`),
    section("Findings", bullets(result.findings.map((finding) => finding.observation))),
    section("Entity Strengthening Checklist", result.recommendations.map((item) => `- [ ] ${item}`).join("\n")),
    section("Priority Fix", result.priorityFix),
  ]);
}

export const entityClarityTool = defineTool({
  name: "entity_clarity_score",
  description:
    "Score from 0 to 100 how clearly AI assistants can tell what a brand is, what it does and who it serves. " +
    "Whitespace in the inputs does not affect the score.",
  inputSchema: {
    type: "object",
    additionalProperties: false,
    required: ["brand_name"],
    properties: {
      brand_name: { type: "string", minLength: 1, description: "Brand name to score." },
      tagline_or_description: {
        type: "string",
        description: "The brand's own description of itself (homepage or About page).",
      },
    },
  },
  params: entityClarityParams,
  handler: entityClarityScore,
  render: renderEntityClarity,
});
