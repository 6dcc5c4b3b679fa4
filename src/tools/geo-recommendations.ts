import { z } from "zod";
import { ratingFor, type AuditResult, type Finding } from "../lib/audit-result";
import { document, numbered, section, table } from "../lib/report";
import { checksumScore, percentage } from "../lib/scoring";
import { defineTool } from "../lib/tool-registry";
import { MAX_LIST_ITEMS, requiredText, textList } from "./params";

export const RECOMMENDATION_THRESHOLD = 62;

export const geoRecommendationsParams = z
  .object({
    brand_name: requiredText,
    service: requiredText,
    target_locations: textList,
  })
  .strict();

export type GeoRecommendationsParams = z.output<typeof geoRecommendationsParams>;

export type LocationStatus = {
  location: string;
  recommended: boolean;
  likelihood: number;
  action: string;
};

export type GeoRecommendationsResult = AuditResult<{
  service: string;
  locations: LocationStatus[];
  appearingCount: number;
  missing: string[];
  testPrompt: string;
}>;

export function assessLocation(brand: string, location: string): LocationStatus {
  const likelihood = checksumScore(brand + location);
  const recommended = likelihood > RECOMMENDATION_THRESHOLD;
  return {
    location,
    recommended,
    likelihood,
    action: recommended
      ? "Maintain local content signals"
      : `Publish ${location}-specific case studies or a landing page`,
  };
}

export function geoRecommendations(params: GeoRecommendationsParams): GeoRecommendationsResult {
  const brand = params.brand_name;
  const service = params.service;
  const locations = params.target_locations.map((location) => assessLocation(brand, location));
  const appearingCount = locations.filter((entry) => entry.recommended).length;
  const missing = locations.filter((entry) => !entry.recommended).map((entry) => entry.location);
  const score = percentage(appearingCount, locations.length);

  const findings: Finding[] = locations.map((entry) => ({
    observation: entry.recommended
      ? `${entry.location}: ${brand} is likely to be recommended for ${service}.`
      : `${entry.location}: ${brand} is unlikely to appear when users ask for ${service}.`,
    signal: entry.recommended ? "recommended" : "not_appearing",
    evidence: { location: entry.location, likelihood: entry.likelihood },
  }));

  const recommendations: string[] = [];
  if (missing.length > 0) {
    recommendations.push(
      `Create location-specific landing pages with real local content for: ${missing.join(", ")}.`,
      `Start with ${missing.slice(0, 2).join(" and ")}: one strong piece of location-specific content this week.`,
    );
  }
  recommendations.push(
    "Publish local case studies that mention both the location and the brand.",
    "Get mentioned in regional business publications.",
    "Complete your Google Business Profile to reinforce location signals.",
    "Collect location-tagged testimonials.",
  );

  return {
    tool: "geo_recommendations",
    brand,
    score,
    rating: ratingFor(score),
    findings,
    recommendations,
    service,
    locations,
    appearingCount,
    missing,
    testPrompt: `Who provides the best ${service} in [city]?`,
  };
}

export function renderGeoRecommendations(result: GeoRecommendationsResult): string {
  return document(`Geographic AI Recommendation Audit: ${result.brand}`, [
    `## Service: ${result.service}`,
    `## Appearing in ${result.appearingCount}/${result.locations.length} target locations`,
    result.locations.length === 0
      ? ""
      : section(
          "Location-by-Location Status",
          table(
            ["Location", "AI Recommendation Status", "Action"],
            result.locations.map((entry) => [
              entry.location,
              entry.recommended ? "Recommended" : "Not appearing",
              entry.action,
            ]),
          ),
        ),
    section("How to Build Geographic AI Presence", numbered(result.recommendations)),
    section("Test It Yourself", `Ask an assistant: \`${result.testPrompt}\` for each location above.`),
  ]);
}

export const geoRecommendationsTool = defineTool({
  name: "geo_recommendations",
  description:
    "Estimate whether AI assistants recommend a brand for a service in each target location. Returns one " +
    "status per location, in input order, and how to expand the brand's geographic footprint.",
  inputSchema: {
    type: "object",
    additionalProperties: false,
    required: ["brand_name", "service", "target_locations"],
    properties: {
      brand_name: { type: "string", minLength: 1, description: "Brand name to check." },
      service: { type: "string", minLength: 1, description: "The service or product to test recommendations for." },
      target_locations: {
        type: "array",
        maxItems: MAX_LIST_ITEMS,
        items: { type: "string", minLength: 1 },
        description: "Cities or regions (e.g. ['New York', 'London', 'Sydney']).",
      },
    },
  },
  params: geoRecommendationsParams,
  handler: geoRecommendations,
  render: renderGeoRecommendations,
});
