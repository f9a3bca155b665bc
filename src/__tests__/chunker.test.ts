import { describe, expect, it } from "vitest";
import { chunkText, normalizeWhitespace } from "../chunker.js";
import { InvalidConfigError } from "../errors.js";

const TWO_SENTENCES =
  "Photosynthesis is the process plants use to convert light into energy. Cats are mammals that sleep most of the day.";

function longText(): string {
  const sentences: string[] = [];
  for (let i = 0; i < 60; i++) {
    sentences.push(`Sentence number ${i} talks about topic ${i % 7} in some detail${i % 3 === 0 ? "!" : "."}`);
    if (i % 5 === 0) sentences.push("A long run without any terminal punctuation keeps going and going and going and going");
  }
  return sentences.join("\n\t ");
}

describe("normalizeWhitespace", () => {
  it("collapses whitespace runs and trims", () => {
    expect(normalizeWhitespace("  a \n\n b\tc  ")).toBe("a b c");
  });
});

describe("chunkText", () => {
  it("returns no chunks for blank text", () => {
    expect(chunkText("", 100, 10)).toEqual([]);
    expect(chunkText(" \n\t ", 100, 10)).toEqual([]);
  });

  it("rejects invalid size and overlap", () => {
    expect(() => chunkText("text", 0, 0)).toThrow(InvalidConfigError);
    expect(() => chunkText("text", 10, 10)).toThrow(InvalidConfigError);
    expect(() => chunkText("text", 10, -1)).toThrow(InvalidConfigError);
    expect(() => chunkText("text", 10.5, 1)).toThrow(InvalidConfigError);
  });

  it("returns short text as a single chunk", () => {
    expect(chunkText("  Hello   world. ", 500, 150)).toEqual([{ text: "Hello world.", start: 0, end: 12 }]);
  });

  it("breaks after the sentence terminal inside the look-back window", () => {
    const chunks = chunkText(TWO_SENTENCES, 80, 10);
    expect(chunks).toEqual([
      { text: "Photosynthesis is the process plants use to convert light into energy.", start: 0, end: 70 },
      { text: "to energy. Cats are mammals that sleep most of the day.", start: 60, end: 115 },
    ]);
  });

  it("falls back to a hard cut when no terminal is close enough", () => {
    const chunks = chunkText(TWO_SENTENCES, 60, 10);
    expect(chunks.map(chunk => chunk.text)).toEqual([
      "Photosynthesis is the process plants use to convert light in",
      "t light into energy. Cats are mammals that sleep most of the",
      "ost of the day.",
    ]);
    expect(chunks.map(chunk => [chunk.start, chunk.end])).toEqual([[0, 60], [50, 110], [100, 115]]);
  });

  it.each([
    [500, 150],
    [300, 0],
    [120, 100],
    [40, 39],
    [1500, 200],
  ])("covers the normalized text with bounded overlap (size %i, overlap %i)", (size, overlap) => {
    const text = longText();
    const normalized = normalizeWhitespace(text);
    const chunks = chunkText(text, size, overlap);

    expect(chunks.length).toBeGreaterThan(0);
    expect(chunks[0]?.start).toBe(0);
    expect(chunks[chunks.length - 1]?.end).toBe(normalized.length);

    for (const chunk of chunks) {
      expect(chunk.text.length).toBeGreaterThan(0);
      expect(chunk.text).toBe(normalized.slice(chunk.start, chunk.end).trim());
    }
    for (const [i, current] of chunks.entries()) {
      const previous = chunks[i - 1];
      if (!previous) continue;
      expect(current.start).toBeLessThanOrEqual(previous.end);
      expect(current.start).toBeGreaterThanOrEqual(previous.end - overlap);
      expect(current.end).toBeGreaterThan(previous.end);
    }
  });

  it.each([
    [100, 50],
    [500, 150],
    [60, 0],
  ])("bounds the chunk count by length / (size - overlap) + 1 on hard cuts (size %i, overlap %i)", (size, overlap) => {
    // No sentence terminals, so every window is cut at full size.
    const text = Array.from({ length: 400 }, (_, i) => `word${i % 10}`).join(" ");
    const chunks = chunkText(text, size, overlap);
    expect(chunks.length).toBeLessThanOrEqual(text.length / (size - overlap) + 1);
    expect(chunks.slice(0, -1).every(chunk => chunk.end - chunk.start === size)).toBe(true);
  });

  it("keeps moving forward when the overlap would rewind past the window start", () => {
    const text = "a. b. c. d. e. f. g. h. i. j. k. l. m. n. o. p.";
    const chunks = chunkText(text, 10, 9);
    const starts = chunks.map(chunk => chunk.start);
    expect(starts).toEqual([...starts].sort((a, b) => a - b));
    expect(new Set(starts).size).toBe(starts.length);
    expect(chunks[chunks.length - 1]?.end).toBe(text.length);
  });

  it("is deterministic", () => {
    expect(chunkText(longText(), 300, 50)).toEqual(chunkText(longText(), 300, 50));
  });
});
