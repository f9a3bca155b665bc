import { describe, expect, it } from "vitest";
import { estimatePage, findPageMarkers, pageAt } from "../pageLocator.js";

describe("findPageMarkers", () => {
  it("returns markers with their offsets in reading order", () => {
    expect(findPageMarkers("[PAGE 1] a [PAGE 12] b")).toEqual([
      { offset: 0, page: 1 },
      { offset: 11, page: 12 },
    ]);
  });

  it("ignores text that only resembles a marker", () => {
    expect(findPageMarkers("[page 1] [PAGE x] PAGE 3")).toEqual([]);
  });
});

describe("pageAt", () => {
  const markers = [
    { offset: 0, page: 1 },
    { offset: 11, page: 12 },
  ];

  it("returns the page of the last marker at or before the position", () => {
    expect(pageAt(markers, 5)).toBe(1);
    expect(pageAt(markers, 11)).toBe(12);
    expect(pageAt(markers, 100)).toBe(12);
  });

  it("returns 1 before the first marker", () => {
    expect(pageAt([{ offset: 10, page: 4 }], 3)).toBe(1);
  });
});

describe("estimatePage", () => {
  const text = "[PAGE 1] Intro text. [PAGE 2] Photosynthesis is how plants make food.";

  it("finds the page interval containing the chunk", () => {
    expect(estimatePage("Photosynthesis is", text)).toBe(2);
    expect(estimatePage("Intro text.", text)).toBe(1);
    expect(estimatePage("Beta text.", "[PAGE 1]\nAlpha text. [PAGE 2]\nBeta text.")).toBe(2);
  });

  it("returns 1 without markers", () => {
    expect(estimatePage("Some text", "Some text with no page markers.")).toBe(1);
  });

  it("returns 1 when the chunk is not found", () => {
    expect(estimatePage("Volcanoes", text)).toBe(1);
  });

  it("returns 1 for a chunk before the first marker", () => {
    const preface = "Preface words. [PAGE 3] Body.";
    expect(estimatePage("Preface", preface)).toBe(1);
    expect(estimatePage("Body", preface)).toBe(3);
  });

  it("searches the whitespace-normalized text when asked", () => {
    const raw = "[PAGE 1]\nAlpha\n\ntext. [PAGE 2]\nBeta   text.";
    expect(estimatePage("[PAGE 2] Beta text.", raw)).toBe(1);
    expect(estimatePage("[PAGE 2] Beta text.", raw, { normalizedFallback: true })).toBe(2);
  });

  it("returns 1 for a marker number too large to represent", () => {
    expect(estimatePage("text", "[PAGE 99999999999999999999] text")).toBe(1);
  });
});
