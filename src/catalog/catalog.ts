import { parseApproachFields, parseNeoFields } from "#types";
import { DEFAULT_CONFIG, type CatalogConfig } from "#config";
import { NearEarthObject } from "#models/neo";
import { CloseApproach } from "#models/approach";
import { createLogger, type Logger } from "../log.js";
import { linkApproaches, type LinkIssue } from "./linker.js";

/** Objects and approaches with their links in place */
export interface Catalog {
  neos: NearEarthObject[];
  approaches: CloseApproach[];
  issues: LinkIssue[];
}

/**
 * Build a linked catalog from raw object and approach records.
 *
 * Every record is validated against its field schema and constructed on
 * its own; approaches are then linked to their objects by designation.
 * Link issues are logged as warnings, or thrown under `strictLinking`.
 */
export function buildCatalog(
  neoRecords: Iterable<unknown>,
  approachRecords: Iterable<unknown>,
  config: Partial<CatalogConfig> = {},
  logger?: Logger
): Catalog {
  const settings: CatalogConfig = { ...DEFAULT_CONFIG, ...config };
  const log = logger ?? createLogger({ quiet: settings.quiet });

  const neos: NearEarthObject[] = [];
  for (const record of neoRecords) {
    neos.push(
      new NearEarthObject(parseNeoFields(record), {
        zeroDiameterIsUnknown: settings.zeroDiameterIsUnknown,
      })
    );
  }

  const approaches: CloseApproach[] = [];
  for (const record of approachRecords) {
    approaches.push(new CloseApproach(parseApproachFields(record)));
  }

  const { linked, issues } = linkApproaches(neos, approaches, {
    strict: settings.strictLinking,
  });

  for (const issue of issues) {
    log.warn(issue.message);
  }
  log.info(
    `Loaded ${neos.length} objects and ${approaches.length} approaches (${linked} linked)`
  );

  return { neos, approaches, issues };
}
