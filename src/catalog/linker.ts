import type { NearEarthObject } from "#models/neo";
import type { CloseApproach } from "#models/approach";

export type LinkIssueKind = "unresolved" | "duplicate" | "already_linked";

/** A problem found while linking approaches to their objects */
export interface LinkIssue {
  kind: LinkIssueKind;
  designation: string;
  message: string;
}

/** Error thrown by strict linking, carrying every issue found */
export class LinkError extends Error {
  readonly issues: LinkIssue[];

  constructor(issues: LinkIssue[]) {
    super(
      `Linking failed with ${issues.length} issue(s):\n` +
        issues.map((issue) => `  ${issue.message}`).join("\n")
    );
    this.name = "LinkError";
    this.issues = issues;
  }
}

export interface LinkOptions {
  /** Throw a LinkError when any issue is found */
  strict?: boolean;
}

export interface LinkResult {
  /** Number of approaches linked by this call */
  linked: number;
  issues: LinkIssue[];
}

/**
 * Index objects by designation. The first object with a designation wins;
 * later ones are reported as duplicates.
 */
export function indexByDesignation(
  neos: Iterable<NearEarthObject>,
  issues: LinkIssue[] = []
): Map<string, NearEarthObject> {
  const index = new Map<string, NearEarthObject>();
  for (const neo of neos) {
    if (index.has(neo.designation)) {
      issues.push({
        kind: "duplicate",
        designation: neo.designation,
        message: `Duplicate designation "${neo.designation}"; keeping the first object`,
      });
      continue;
    }
    index.set(neo.designation, neo);
  }
  return index;
}

/**
 * Resolve each approach's designation into its object, setting `neo` on
 * the approach and appending the approach to the object's `approaches`.
 * Approaches are appended in input order.
 *
 * Every approach is resolved before any link is applied, so a strict
 * failure leaves objects and approaches untouched.
 */
export function linkApproaches(
  neos: Iterable<NearEarthObject>,
  approaches: Iterable<CloseApproach>,
  options: LinkOptions = {}
): LinkResult {
  const issues: LinkIssue[] = [];
  const index = indexByDesignation(neos, issues);
  const pending = new Map<CloseApproach, NearEarthObject>();

  for (const approach of approaches) {
    const designation = approach.designation;

    const current = approach.neo ?? pending.get(approach);
    if (current) {
      issues.push({
        kind: "already_linked",
        designation,
        message: `Approach of "${designation}" is already linked to "${current.designation}"`,
      });
      continue;
    }

    // An empty designation is a missing key, not a match for an empty one
    const neo = designation ? index.get(designation) : undefined;
    if (!neo) {
      issues.push({
        kind: "unresolved",
        designation,
        message: `Approach references unknown designation "${designation}"`,
      });
      continue;
    }

    pending.set(approach, neo);
  }

  if (options.strict && issues.length > 0) {
    throw new LinkError(issues);
  }

  // Map iteration follows insertion, so input order is kept
  for (const [approach, neo] of pending) {
    approach.neo = neo;
    neo.approaches.push(approach);
  }

  return { linked: pending.size, issues };
}
