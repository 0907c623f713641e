import test from "node:test";
import assert from "node:assert/strict";
import { MalformedRowError } from "../src/common/errors.js";
import { decodeRow, encodeRow } from "../src/extract/renderRow.js";

test("decodeRow builds a typed record from a complete row", () => {
  const record = decodeRow(["id1", "Maya", "Arnold", "10", "true", "5000", "2.5", "80.0"]);
  assert.deepEqual(record, {
    id: "id1",
    application: "Maya",
    renderer: "Arnold",
    frameCount: 10,
    succeeded: true,
    renderTimeMillis: 5000,
    peakRamMB: 2.5,
    peakCpuPercent: 80,
  });
});

test("decodeRow keeps missing optional metrics as null, not zero", () => {
  const record = decodeRow(["id2", "Maya", "Arnold", "8", "false", "", "", ""]);
  assert.equal(record.succeeded, false);
  assert.equal(record.renderTimeMillis, null);
  assert.equal(record.peakRamMB, null);
  assert.equal(record.peakCpuPercent, null);
});

test("decodeRow degrades each unparsable optional field independently", () => {
  const record = decodeRow(["id3", "Houdini", "Mantra", "4", "true", "12.5", "abc", "0"]);
  assert.equal(record.renderTimeMillis, null);
  assert.equal(record.peakRamMB, null);
  assert.equal(record.peakCpuPercent, 0);
});

test("decodeRow rejects a non-integer frame count with its location", () => {
  assert.throws(
    () =>
      decodeRow(["id4", "Maya", "Arnold", "ten", "true", "1", "1", "1"], {
        filePath: "/logs/renders_2024-01-01.csv",
        rowNumber: 3,
      }),
    (error: unknown) => {
      assert.ok(error instanceof MalformedRowError);
      assert.equal(
        error.message,
        'Malformed row 3 in /logs/renders_2024-01-01.csv: frameCount "ten" is not an integer',
      );
      assert.deepEqual(error.location, { filePath: "/logs/renders_2024-01-01.csv", rowNumber: 3 });
      return true;
    },
  );
});

test("decodeRow rejects rows without exactly eight fields", () => {
  assert.throws(
    () => decodeRow(["id5", "Maya", "Arnold", "10", "true"]),
    /^MalformedRowError: Malformed row: expected 8 fields, got 5$/,
  );
});

test("decoding then encoding keeps application, renderer, frame count and success", () => {
  const source = ["id6", "Nuke", "Redshift", "24", " true ", "", "1.25", "n/a"];
  const [, application, renderer, frameCount, success] = encodeRow(decodeRow(source));
  assert.deepEqual([application, renderer, frameCount, success], ["Nuke", "Redshift", "24", "true"]);
});

test("encodeRow writes absent metrics as empty fields", () => {
  const fields = encodeRow(decodeRow(["id7", "Maya", "Arnold", "8", "false", "", "3.5", ""]));
  assert.deepEqual(fields, ["id7", "Maya", "Arnold", "8", "false", "", "3.5", ""]);
});
