/**
 * Record Transform Tests
 *
 * Unit tests for line decoding and field lookup.
 */
import { describe, expect, it } from "vitest";

import {
  decodeRecord,
  field,
  intField,
  isTruthyMarker,
  textField,
} from "../transform.js";

const VALIDITY = "_tvalide";

function frameLine(fields: Record<string, unknown>, valid: unknown = 1): string {
  return JSON.stringify({ ...fields, [VALIDITY]: valid });
}

// =============================================================================
// decodeRecord Tests
// =============================================================================

describe("decodeRecord", () => {
  it("decodes a valid frame with fields", () => {
    const line = frameLine({
      SINSTS: { data: 2450, horodate: "H240115104500" },
      MSG1: { data: "PAS DE MESSAGE" },
    });

    const result = decodeRecord(line, VALIDITY);

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toEqual({
      valid: true,
      fields: {
        SINSTS: { data: 2450, timestamp: "H240115104500" },
        MSG1: { data: "PAS DE MESSAGE", timestamp: null },
      },
    });
  });

  it("drops descriptive keys from field entries", () => {
    const line = frameLine({
      NTARF: { data: 2, desc: "Numéro de l'index tarifaire en cours", unit: "" },
    });

    const record = decodeRecord(line, VALIDITY)._unsafeUnwrap();

    expect(record.fields).toEqual({ NTARF: { data: 2, timestamp: null } });
  });

  it("leaves out entries that are not field objects", () => {
    const line = frameLine({
      SINSTS: { data: 100 },
      BROKEN: "just a string",
      EMPTY: {},
    });

    const record = decodeRecord(line, VALIDITY)._unsafeUnwrap();

    expect(Object.keys(record.fields)).toEqual(["SINSTS"]);
  });

  it("returns a frozen record", () => {
    const record = decodeRecord(frameLine({ SINSTS: { data: 1 } }), VALIDITY)
      ._unsafeUnwrap();

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.fields)).toBe(true);
  });

  it("rejects a line that is not JSON", () => {
    const result = decodeRecord("{ \"SINSTS\": { \"data\": 1", VALIDITY);

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().type).toBe("MALFORMED_LINE");
  });

  it("rejects JSON that is not an object", () => {
    expect(decodeRecord("[1, 2, 3]", VALIDITY)._unsafeUnwrapErr().type).toBe(
      "NOT_A_FRAME",
    );
    expect(decodeRecord("42", VALIDITY)._unsafeUnwrapErr().type).toBe(
      "NOT_A_FRAME",
    );
    expect(decodeRecord("null", VALIDITY)._unsafeUnwrapErr().type).toBe(
      "NOT_A_FRAME",
    );
  });

  it("rejects a frame flagged invalid", () => {
    const result = decodeRecord(frameLine({ SINSTS: { data: 1 } }, 0), VALIDITY);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "INVALID_FRAME",
      message: 'Validity marker "_tvalide" not set',
      marker: 0,
    });
  });

  it("rejects a frame without validity marker", () => {
    const line = JSON.stringify({ SINSTS: { data: 1 } });

    const result = decodeRecord(line, VALIDITY);

    expect(result._unsafeUnwrapErr().type).toBe("INVALID_FRAME");
  });

  it("uses the configured validity code", () => {
    const line = JSON.stringify({ ok: true, PAPP: { data: 10 } });

    const record = decodeRecord(line, "ok")._unsafeUnwrap();

    expect(record.fields).toEqual({ PAPP: { data: 10, timestamp: null } });
  });
});

// =============================================================================
// isTruthyMarker Tests
// =============================================================================

describe("isTruthyMarker", () => {
  it.each([
    [1, true],
    [true, true],
    ["1", true],
    [0, false],
    [false, false],
    ["0", false],
    ["", false],
    [null, false],
    [undefined, false],
  ])("treats %j as %s", (marker, expected) => {
    expect(isTruthyMarker(marker)).toBe(expected);
  });
});

// =============================================================================
// Field Lookup Tests
// =============================================================================

describe("field lookup", () => {
  const record = decodeRecord(
    frameLine({
      SINSTS: { data: 3200 },
      NTARF: { data: "03" },
      STGE: { data: "003A4301" },
      MSG1: { data: "PAS DE          MESSAGE" },
      EAST: { data: 12.5 },
    }),
    VALIDITY,
  )._unsafeUnwrap();

  it("returns null for absent fields", () => {
    expect(field(record, "RELAIS")).toBeNull();
    expect(intField(record, "RELAIS")).toBeNull();
    expect(textField(record, "RELAIS")).toBeNull();
  });

  it("does not expose inherited properties as fields", () => {
    expect(field(record, "toString")).toBeNull();
  });

  it("reads integer data", () => {
    expect(intField(record, "SINSTS")).toBe(3200);
  });

  it("reads decimal digit strings as integers", () => {
    expect(intField(record, "NTARF")).toBe(3);
  });

  it("does not read non-integer data as integers", () => {
    expect(intField(record, "STGE")).toBeNull();
    expect(intField(record, "EAST")).toBeNull();
  });

  it("reads text data", () => {
    expect(textField(record, "MSG1")).toBe("PAS DE          MESSAGE");
    expect(textField(record, "SINSTS")).toBe("3200");
  });
});
