export type Rating = "strong" | "moderate" | "weak";

export type Evidence = Record<string, string | number | boolean>;

export interface Finding {
  observation: string;
  signal?: string;
  evidence?: Evidence;
}

/**
 * Shape every audit tool returns. Tools add their own fields next to the
 * common ones, so the type is open over `Extra`.
 */
export type AuditResult<Extra extends object = Record<string, unknown>> = {
  tool: string;
  brand: string;
  score: number;
  rating: Rating;
  findings: Finding[];
  recommendations: string[];
} & Extra;

export interface ToolOutput {
  structured: AuditResult;
  text: string;
}

export function ratingFor(score: number): Rating {
  if (score > 70) {
    return "strong";
  }
  if (score > 55) {
    return "moderate";
  }
  return "weak";
}

export function ratingLabel(rating: Rating): string {
  return rating === "strong" ? "Strong" : rating === "moderate" ? "Moderate" : "Weak";
}
