import { inspect } from "node:util";
import type { ApproachFields, ApproachRow } from "#types";
import { cdToDate, dateToString } from "#helpers/dates";
import type { NearEarthObject } from "./neo.js";
import { isPresent, toFloat, toText } from "./coerce.js";

/** Error for serializing an approach that was never linked to its object */
export class UnlinkedApproachError extends Error {
  readonly designation: string;

  constructor(designation: string) {
    super(
      `Close approach of "${designation}" is not linked to a near-Earth object`
    );
    this.name = "UnlinkedApproachError";
    this.designation = designation;
  }
}

/**
 * A close approach to Earth by an NEO.
 *
 * Records the time of closest approach (UTC), the nominal distance in
 * astronomical units and the relative velocity in km/s. Until linked,
 * the approach only knows its object's designation; `neo` is set once
 * the designation has been resolved.
 */
export class CloseApproach {
  private readonly _designation: string;
  readonly time: Date | null;
  readonly distance: number;
  readonly velocity: number;
  neo: NearEarthObject | null = null;

  constructor(fields: ApproachFields = {}) {
    const time = toText(fields.time);

    this._designation = toText(fields.designation) ?? "";
    this.time = time !== undefined ? cdToDate(time) : null;
    this.distance = isPresent(fields.distance)
      ? toFloat("distance", fields.distance)
      : 0;
    this.velocity = isPresent(fields.velocity)
      ? toFloat("velocity", fields.velocity)
      : 0;
  }

  /** Designation of the object this approach belongs to, as recorded in the source */
  get designation(): string {
    return this._designation;
  }

  get timeStr(): string {
    return this.time !== null ? dateToString(this.time) : "n/a date";
  }

  get fullname(): string {
    return this.neo ? this.neo.fullname : this._designation;
  }

  /**
   * Export row for CSV or JSON writers.
   * @throws UnlinkedApproachError when the approach has no linked object
   */
  serialize(): ApproachRow {
    if (!this.neo) {
      throw new UnlinkedApproachError(this._designation);
    }
    return {
      datetime_utc: this.time !== null ? dateToString(this.time) : "",
      distance_au: this.distance,
      velocity_km_s: this.velocity,
      neo: this.neo.serialize(),
    };
  }

  toString(): string {
    return (
      `On ${this.timeStr}, '${this.fullname}' approaches Earth ` +
      `at a distance of ${this.distance.toFixed(2)} au ` +
      `and a velocity of ${this.velocity.toFixed(2)} km/s.`
    );
  }

  inspect(): string {
    const neo = this.neo ? this.neo.inspect() : "null";
    return (
      `CloseApproach(time=${JSON.stringify(this.timeStr)}, ` +
      `distance=${this.distance.toFixed(2)}, ` +
      `velocity=${this.velocity.toFixed(2)}, neo=${neo})`
    );
  }

  [inspect.custom](): string {
    return this.inspect();
  }
}
