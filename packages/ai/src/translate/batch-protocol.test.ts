import { describe, it, expect } from "vitest";
import {
  applyMapping,
  decodeBatchResponse,
  encodeBatch,
  validateMapping,
} from "./batch-protocol";

describe("batch protocol", () => {
  describe("encodeBatch", () => {
    it("prefixes every text with its batch position", () => {
      expect(encodeBatch(["Hello", "World"])).toBe("0_> Hello\n1_> World");
    });

    it("encodes an empty batch as an empty payload", () => {
      expect(encodeBatch([])).toBe("");
    });
  });

  describe("decodeBatchResponse", () => {
    it("recovers the encoded texts, including multi-line ones", () => {
      const texts = ["First entry", "Second line one\nSecond line two", "Third!"];

      const mapping = decodeBatchResponse(encodeBatch(texts));

      expect([...mapping.entries()]).toEqual([
        [0, "First entry"],
        [1, "Second line one\nSecond line two"],
        [2, "Third!"],
      ]);
    });

    it("accepts the separator variants translators produce", () => {
      const mapping = decodeBatchResponse(
        ["0_> Xin chào", " 1 > Thế giới", "2. Một", "3: Hai", "4 - Ba", "5_Bốn"].join("\n")
      );

      expect(Object.fromEntries(mapping)).toEqual({
        0: "Xin chào",
        1: "Thế giới",
        2: "Một",
        3: "Hai",
        4: "Ba",
        5: "Bốn",
      });
    });

    it("appends unmarked lines to the open entry and trims each one", () => {
      const mapping = decodeBatchResponse("0_> line one\n   line two  \n\n1_> next\r\n");

      expect(mapping.get(0)).toBe("line one\nline two");
      expect(mapping.get(1)).toBe("next");
    });

    it("drops text before the first marker", () => {
      const mapping = decodeBatchResponse("Here is your translation:\n0_> Bonjour");

      expect([...mapping.entries()]).toEqual([[0, "Bonjour"]]);
    });

    it("returns an empty mapping when no line carries a marker", () => {
      expect(decodeBatchResponse("I cannot translate this.").size).toBe(0);
    });

    it("keeps the last value when an index repeats", () => {
      const mapping = decodeBatchResponse("0_> a\n0_> b");

      expect(mapping.size).toBe(1);
      expect(mapping.get(0)).toBe("b");
    });

    // Known ambiguity: a continuation line that starts with "digits + separator"
    // is read as a new entry rather than as text of the previous one.
    it("treats a continuation line shaped like a marker as a new entry", () => {
      const mapping = decodeBatchResponse("0_> Steps:\n3. mix well\n1_> Done");

      expect(Object.fromEntries(mapping)).toEqual({
        0: "Steps:",
        3: "mix well",
        1: "Done",
      });
    });
  });

  describe("validateMapping", () => {
    it("accepts a mapping with one value per entry", () => {
      expect(validateMapping(new Map([[0, "a"], [1, "b"]]), 2)).toEqual({ success: true });
    });

    it("rejects short and long mappings", () => {
      expect(validateMapping(new Map([[0, "a"]]), 2)).toEqual({
        success: false,
        kind: "BatchValidationFailure",
        error: "Mismatched line count in batch. Expected 2, got 1",
      });
      expect(validateMapping(new Map([[0, "a"], [1, "b"], [2, "c"]]), 2).success).toBe(false);
    });
  });

  describe("applyMapping", () => {
    it("keeps the source text for positions the mapping misses", () => {
      const result = applyMapping(["one", "two"], new Map([[0, "uno"], [5, "cinco"]]));

      expect(result).toEqual({ texts: ["uno", "two"], missing: [1] });
    });

    // Known edge case: a reply renumbered from 1 has the right size, so it is
    // accepted and every translation lands one position late.
    it("accepts a reply renumbered from 1 and shifts it by one entry", () => {
      const texts = ["one", "two"];
      const mapping = decodeBatchResponse("1_> UNO\n2_> DOS");

      expect(validateMapping(mapping, texts.length)).toEqual({ success: true });
      expect(applyMapping(texts, mapping)).toEqual({
        texts: ["one", "UNO"],
        missing: [0],
      });
    });
  });
});
