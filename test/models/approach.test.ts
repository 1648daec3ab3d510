import { describe, it, expect } from "vitest";
import { NearEarthObject } from "#models/neo";
import { CloseApproach, UnlinkedApproachError } from "#models/approach";
import { FieldCoercionError } from "#models/coerce";
import { DateFormatError } from "#helpers/dates";

function makeNeo(): NearEarthObject {
  return new NearEarthObject({
    designation: "2000 AB",
    name: null,
    diameter: null,
    hazardous: "N",
  });
}

describe("CloseApproach", () => {
  describe("constructor", () => {
    it("defaults every field when given nothing", () => {
      const approach = new CloseApproach();

      expect(approach.designation).toBe("");
      expect(approach.time).toBeNull();
      expect(approach.distance).toBe(0);
      expect(approach.velocity).toBe(0);
      expect(approach.neo).toBeNull();
    });

    it("parses time, distance and velocity", () => {
      const approach = new CloseApproach({
        designation: "2000 AB",
        time: "2020-Jan-01 12:00",
        distance: "0.5",
        velocity: "12.3",
      });

      expect(approach.designation).toBe("2000 AB");
      expect(approach.time?.toISOString()).toBe("2020-01-01T12:00:00.000Z");
      expect(approach.distance).toBe(0.5);
      expect(approach.velocity).toBe(12.3);
    });

    it("defaults empty distance and velocity to zero, not NaN", () => {
      const approach = new CloseApproach({ distance: "", velocity: null });

      expect(approach.distance).toBe(0);
      expect(approach.velocity).toBe(0);
    });

    it("throws on a non-numeric velocity", () => {
      expect(() => new CloseApproach({ velocity: "fast" })).toThrow(
        FieldCoercionError
      );
    });

    it("throws on a malformed time", () => {
      expect(() => new CloseApproach({ time: "01/01/2020" })).toThrow(
        DateFormatError
      );
    });
  });

  describe("timeStr", () => {
    it("is n/a date without a time", () => {
      expect(new CloseApproach().timeStr).toBe("n/a date");
    });

    it("formats the time to the minute", () => {
      const approach = new CloseApproach({ time: "2020-Jan-01 12:00" });
      expect(approach.timeStr).toBe("2020-01-01 12:00");
    });
  });

  describe("fullname", () => {
    it("falls back to the stored designation before linking", () => {
      const approach = new CloseApproach({ designation: "433" });
      expect(approach.fullname).toBe("433");
    });

    it("uses the linked object's fullname", () => {
      const approach = new CloseApproach({ designation: "433" });
      approach.neo = new NearEarthObject({ designation: "433", name: "Eros" });

      expect(approach.fullname).toBe("433 (Eros)");
      expect(approach.designation).toBe("433");
    });
  });

  describe("serialize", () => {
    it("nests the linked object's row", () => {
      const neo = makeNeo();
      const approach = new CloseApproach({
        designation: "2000 AB",
        time: "2020-Jan-01 12:00",
        distance: "0.5",
        velocity: "12.3",
      });
      approach.neo = neo;

      const row = approach.serialize();

      expect(row.neo.designation).toBe("2000 AB");
      expect(row.distance_au).toBe(0.5);
      expect(row).toEqual({
        datetime_utc: "2020-01-01 12:00",
        distance_au: 0.5,
        velocity_km_s: 12.3,
        neo: {
          designation: "2000 AB",
          name: "",
          diameter_km: NaN,
          potentially_hazardous: false,
        },
      });
    });

    it("writes an empty datetime when the time is unknown", () => {
      const approach = new CloseApproach({ designation: "2000 AB" });
      approach.neo = makeNeo();

      expect(approach.serialize().datetime_utc).toBe("");
    });

    it("throws before the approach is linked", () => {
      const approach = new CloseApproach({ designation: "2000 AB" });

      expect(() => approach.serialize()).toThrow(UnlinkedApproachError);
      expect(() => approach.serialize()).toThrow(
        'Close approach of "2000 AB" is not linked to a near-Earth object'
      );
    });
  });

  describe("toString", () => {
    it("describes the approach", () => {
      const approach = new CloseApproach({
        designation: "433",
        time: "1900-Dec-27 01:30",
        distance: "0.31478",
        velocity: "5.5",
      });
      approach.neo = new NearEarthObject({ designation: "433", name: "Eros" });

      expect(approach.toString()).toBe(
        "On 1900-12-27 01:30, '433 (Eros)' approaches Earth at a distance of 0.31 au and a velocity of 5.50 km/s."
      );
    });

    it("describes an unlinked approach without a time", () => {
      const approach = new CloseApproach({ designation: "2020 FK" });

      expect(`${approach}`).toBe(
        "On n/a date, '2020 FK' approaches Earth at a distance of 0.00 au and a velocity of 0.00 km/s."
      );
    });
  });

  describe("inspect", () => {
    it("nests the object's debug string", () => {
      const approach = new CloseApproach({
        designation: "2000 AB",
        time: "2020-Jan-01 12:00",
        distance: "0.5",
        velocity: "12.3",
      });
      approach.neo = makeNeo();

      expect(approach.inspect()).toBe(
        'CloseApproach(time="2020-01-01 12:00", distance=0.50, velocity=12.30, ' +
          'neo=NearEarthObject(designation="2000 AB", name=null, diameter=NaN, hazardous=false))'
      );
    });

    it("shows an unlinked object as null", () => {
      expect(new CloseApproach().inspect()).toBe(
        'CloseApproach(time="n/a date", distance=0.00, velocity=0.00, neo=null)'
      );
    });
  });
});
