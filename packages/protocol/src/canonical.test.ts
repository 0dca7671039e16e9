/**
 * Tests for canonical encoding and hashing.
 *
 * Uses Node's built-in test runner (node:test).
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Buffer } from "node:buffer";
import {
  canonicalize,
  contentHash,
  parseCanonical,
  sha256,
  toDocument,
  StructuralError,
} from "./index.js";

function text(value: unknown): string {
  return canonicalize(value).toString("utf-8");
}

describe("canonicalize", () => {
  it("should sort keys at every level and drop whitespace", () => {
    assert.equal(
      text({ b: 1, a: [true, null, "x"], c: { z: 2, y: 1.5 } }),
      '{"a":[true,null,"x"],"b":1,"c":{"y":1.5,"z":2}}'
    );
  });

  it("should encode objects with the same members identically regardless of insertion order", () => {
    assert.ok(canonicalize({ id: "tx-1", amount: 100 }).equals(canonicalize({ amount: 100, id: "tx-1" })));
    assert.equal(contentHash({ id: "tx-1", amount: 100 }), contentHash({ amount: 100, id: "tx-1" }));
  });

  it("should order keys by UTF-16 code unit", () => {
    assert.equal(text({ é: 3, a: 2, B: 1 }), '{"B":1,"a":2,"é":3}');
  });

  it("should write -0 as 0 and keep numbers in shortest form", () => {
    assert.equal(text({ n: -0, m: 0.1, big: 1e21 }), '{"big":1e+21,"m":0.1,"n":0}');
  });

  it("should encode strings as UTF-8 JSON literals", () => {
    const bytes = canonicalize({ note: "naïve \"quote\"\n" });
    assert.ok(bytes.equals(Buffer.from('{"note":"naïve \\"quote\\"\\n"}', "utf-8")));
  });

  it("should keep array order", () => {
    assert.equal(text([3, 1, 2]), "[3,1,2]");
  });

  it("should reject non-finite numbers with the offending path", () => {
    assert.throws(() => canonicalize({ x: { y: [1, Number.NaN] } }), {
      name: "StructuralError",
      message: "$.x.y[1]: non-finite number is not representable",
    });
    assert.throws(() => canonicalize({ x: Number.POSITIVE_INFINITY }), StructuralError);
  });

  it("should reject values outside the document model", () => {
    assert.throws(() => canonicalize({ a: undefined }), {
      message: "$.a: undefined value is not representable",
    });
    assert.throws(() => canonicalize({ n: 10n }), {
      message: "$.n: bigint value is not representable",
    });
    assert.throws(() => canonicalize({ d: new Date(0) }), {
      message: "$.d: Date value is not representable",
    });
    assert.throws(() => canonicalize({ m: new Map() }), {
      message: "$.m: Map value is not representable",
    });
  });

  it("should reject holes in sparse arrays", () => {
    const sparse: unknown[] = [1];
    sparse[2] = 3;
    assert.throws(() => canonicalize({ arr: sparse }), {
      message: "$.arr[1]: undefined value is not representable",
    });
  });

  it("should reject cycles", () => {
    const node: Record<string, unknown> = { id: "loop" };
    node.self = node;
    assert.throws(() => canonicalize(node), { message: "$.self: circular reference" });
  });

  it("should allow the same object to appear twice when there is no cycle", () => {
    const shared = { k: 1 };
    assert.equal(text({ a: shared, b: shared }), '{"a":{"k":1},"b":{"k":1}}');
  });
});

describe("sha256 / contentHash", () => {
  it("should hash raw bytes", () => {
    assert.equal(
      sha256(Buffer.from("abc", "utf-8")).toString("hex"),
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
  });

  it("should hash the canonical encoding", () => {
    assert.equal(contentHash({ b: 2, a: 1 }), sha256(Buffer.from('{"a":1,"b":2}', "utf-8")).toString("hex"));
  });
});

describe("parseCanonical", () => {
  it("should decode canonical bytes back into the document", () => {
    const document = { id: "tx-1", amount: 100, lines: [{ sku: "A-1", qty: 2 }], paid: false };
    assert.deepEqual(parseCanonical(canonicalize(document)), document);
  });

  it("should reject bytes that are not in canonical form", () => {
    assert.throws(() => parseCanonical(Buffer.from('{"b":1,"a":2}', "utf-8")), {
      name: "StructuralError",
      message: "Decrypted content is not in canonical form",
    });
    assert.throws(() => parseCanonical(Buffer.from('{"a": 1}', "utf-8")), StructuralError);
  });

  it("should reject invalid JSON and non-object documents", () => {
    assert.throws(() => parseCanonical(Buffer.from("{", "utf-8")), {
      message: "Decrypted content is not valid JSON",
    });
    assert.throws(() => parseCanonical(Buffer.from("[1]", "utf-8")), {
      message: "$: document must be an object",
    });
  });
});

describe("toDocument", () => {
  it("should rebuild plain JSON values", () => {
    assert.deepEqual(toDocument({ a: [1, "x", null], b: { c: true } }), { a: [1, "x", null], b: { c: true } });
  });

  it("should reject a top-level array", () => {
    assert.throws(() => toDocument([]), StructuralError);
  });
});
