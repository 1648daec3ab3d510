import { inspect } from "node:util";
import type { NeoFields, NeoRow, RawValue } from "#types";
import type { CloseApproach } from "./approach.js";
import { isPresent, toFloat, toText } from "./coerce.js";

/** Construction options for a near-Earth object */
export interface NeoOptions {
  /**
   * Treat a diameter of exactly 0 as unknown (NaN), the way the source
   * data is usually read. Defaults to true.
   */
  zeroDiameterIsUnknown?: boolean;
}

/**
 * A near-Earth object (NEO).
 *
 * Holds the object's primary designation (required, unique), IAU name
 * (optional), diameter in kilometers (NaN when unknown) and whether it is
 * flagged as potentially hazardous. `approaches` starts empty and is
 * filled when close approaches are linked to their objects.
 *
 * The diameter is coerced but not range-checked: a negative value in the
 * source is stored as given.
 */
export class NearEarthObject {
  readonly designation: string;
  readonly name: string | null;
  readonly diameter: number;
  readonly hazardous: boolean;
  readonly approaches: CloseApproach[] = [];

  constructor(fields: NeoFields = {}, options: NeoOptions = {}) {
    const zeroDiameterIsUnknown = options.zeroDiameterIsUnknown ?? true;

    this.designation = toText(fields.designation) ?? "";
    this.name = toText(fields.name) ?? null;
    this.diameter = readDiameter(fields.diameter, zeroDiameterIsUnknown);
    this.hazardous = fields.hazardous === "Y";
  }

  /** Designation, followed by the name in parentheses when there is one */
  get fullname(): string {
    return this.name ? `${this.designation} (${this.name})` : this.designation;
  }

  serialize(): NeoRow {
    return {
      designation: this.designation,
      name: this.name ?? "",
      diameter_km: this.diameter,
      potentially_hazardous: this.hazardous,
    };
  }

  toString(): string {
    const verb = this.hazardous ? "is" : "is not";
    return (
      `NEO ${this.fullname} has a diameter of ${this.diameter.toFixed(3)} km ` +
      `and ${verb} potentially hazardous.`
    );
  }

  /** Field-labeled debug representation */
  inspect(): string {
    return (
      `NearEarthObject(designation=${JSON.stringify(this.designation)}, ` +
      `name=${JSON.stringify(this.name)}, ` +
      `diameter=${this.diameter.toFixed(3)}, hazardous=${this.hazardous})`
    );
  }

  [inspect.custom](): string {
    return this.inspect();
  }
}

function readDiameter(
  value: RawValue | undefined,
  zeroDiameterIsUnknown: boolean
): number {
  if (zeroDiameterIsUnknown) {
    return isPresent(value) ? toFloat("diameter", value) : NaN;
  }
  if (value === undefined || value === null || value === "" || value === false) {
    return NaN;
  }
  return toFloat("diameter", value);
}
