/**
 * Comment field decoding
 *
 * Meters write free-text comments such as
 * `Food (30 g); Rapid-acting insulin (4.0); Long-acting insulin (12.5)`.
 * Each recognised token becomes part of a symbolic annotation: one combined
 * insulin annotation and, separately, one food annotation per reading.
 */

import type { Annotation, AnnotationKind } from "../models/index.js";

/** Delimiter between comment tokens */
export const COMMENT_DELIMITER = ";";

const TOKEN_PATTERN =
  /^(food|rapid-acting insulin|long-acting insulin)(?:\s*\(([^)]*)\))?/i;

/**
 * Integer part of a dose string ("4.0" -> "4", "30 g" -> "30"), or "" when
 * the text holds no number
 */
export function truncateDose(raw: string | undefined): string {
  if (raw === undefined) return "";
  const num = parseFloat(raw.trim());
  return isNaN(num) ? "" : String(Math.trunc(num));
}

interface DecodedToken {
  kind: AnnotationKind;
  dose: string;
}

function decodeToken(token: string): DecodedToken | null {
  const match = token.match(TOKEN_PATTERN);
  if (!match) return null;

  const category = match[1].toLowerCase();
  const dose = truncateDose(match[2]);

  if (category === "food") {
    return { kind: "food", dose };
  }
  const suffix = category.startsWith("rapid") ? "R" : "L";
  return { kind: "insulin", dose: `${dose}${suffix}` };
}

/**
 * Decode a comment into annotations.
 *
 * A second token of the same kind is merged into the existing annotation
 * rather than creating another one.
 */
export function parseComment(comment: string | undefined): Annotation[] {
  if (!comment) return [];

  const annotations: Annotation[] = [];

  for (const token of comment.split(COMMENT_DELIMITER)) {
    const decoded = decodeToken(token.trim());
    if (!decoded) continue;

    const existing = annotations.find((a) => a.kind === decoded.kind);
    if (existing) {
      existing.doses.push(decoded.dose);
    } else {
      annotations.push({ kind: decoded.kind, doses: [decoded.dose] });
    }
  }

  // Insulin first so codes read the same regardless of token order
  return annotations.sort((a, b) => (a.kind === b.kind ? 0 : a.kind === "insulin" ? -1 : 1));
}

/**
 * Symbolic code for an annotation, using gnuplot enhanced-text superscripts:
 * `I^{4R/12L}` for insulin, `F` or `F^{30}` for food
 */
export function annotationCode(annotation: Annotation): string {
  const symbol = annotation.kind === "insulin" ? "I" : "F";
  const doses = annotation.doses.filter((d) => d !== "");
  return doses.length > 0 ? `${symbol}^{${doses.join("/")}}` : symbol;
}

/**
 * Codes of all annotations on a reading, space separated
 */
export function annotationCodes(annotations: readonly Annotation[]): string {
  return annotations.map(annotationCode).join(" ");
}
