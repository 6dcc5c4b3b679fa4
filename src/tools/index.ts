import { ToolRegistry, type RegisteredTool } from "../lib/tool-registry";
import { brandPerceptionTool } from "./brand-perception-audit";
import { citationCheckTool } from "./citation-check";
import { competitorComparisonTool } from "./competitor-comparison";
import { entityClarityTool } from "./entity-clarity-score";
import { geoRecommendationsTool } from "./geo-recommendations";

export function auditTools(): RegisteredTool[] {
  return [brandPerceptionTool, citationCheckTool, competitorComparisonTool, entityClarityTool, geoRecommendationsTool];
}

export function createToolRegistry(tools: readonly RegisteredTool[] = auditTools()): ToolRegistry {
  return new ToolRegistry(tools);
}
