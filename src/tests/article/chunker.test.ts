import { expect, test } from "vitest";
import { chunkText, splitIntoChunks } from "../../article/chunker.js";

function makeSentences(count: number): string {
  return Array.from({ length: count }, (_, index) => `Sentence number ${index} is here.`).join(" ");
}

function reconstruct(chunks: string[], overlap: number): string {
  return chunks.map((chunk, index) => (index === 0 ? chunk : chunk.slice(overlap))).join("");
}

test("text shorter than one chunk comes back as a single identical chunk", () => {
  expect(splitIntoChunks("Short text", { chunkSize: 100, overlap: 10 })).toEqual(["Short text"]);

  const exact = "x".repeat(100);
  expect(splitIntoChunks(exact, { chunkSize: 100, overlap: 10 })).toEqual([exact]);
});

test("empty input yields no chunks", () => {
  expect(splitIntoChunks("", { chunkSize: 100, overlap: 10 })).toEqual([]);
});

test("chunks end on sentence boundaries when one is available", () => {
  const text = makeSentences(200);
  const chunks = splitIntoChunks(text, { chunkSize: 500, overlap: 50 });

  expect(chunks.length).toBeGreaterThan(1);
  for (const chunk of chunks.slice(0, -1)) {
    expect(chunk.endsWith(".")).toBe(true);
    expect(chunk.length).toBeLessThanOrEqual(500);
  }
});

test("dropping the overlap from every later chunk reconstructs the input", () => {
  const cases = [
    { text: makeSentences(300), chunkSize: 700, overlap: 100 },
    { text: "no terminators at all ".repeat(400), chunkSize: 1000, overlap: 250 },
    { text: "a".repeat(450_000), chunkSize: 200_000, overlap: 2_000 },
  ];

  for (const { text, chunkSize, overlap } of cases) {
    const chunks = splitIntoChunks(text, { chunkSize, overlap });
    expect(reconstruct(chunks, overlap)).toBe(text);
    expect(chunks.every((chunk) => chunk.length > 0)).toBe(true);
  }
});

test("a 450k character text splits into three fixed-size windows", () => {
  const chunks = splitIntoChunks("a".repeat(450_000), { chunkSize: 200_000, overlap: 2_000 });

  expect(chunks.map((chunk) => chunk.length)).toEqual([200_000, 200_000, 54_000]);
});

test("boundary search only looks at the trailing 1000 characters of the window", () => {
  const early = "a".repeat(500) + ". " + "b".repeat(3000);
  expect(splitIntoChunks(early, { chunkSize: 2000, overlap: 100 })[0]).toHaveLength(2000);

  const late = "a".repeat(1500) + ". " + "b".repeat(3000);
  const chunks = splitIntoChunks(late, { chunkSize: 2000, overlap: 100 });
  expect(chunks[0]).toBe("a".repeat(1500) + ".");
  expect(chunks[1]?.startsWith("a".repeat(99) + ". ")).toBe(true);
});

test("a boundary that would stall the cursor is ignored", () => {
  const text = "ab. " + "c".repeat(300);
  const chunks = splitIntoChunks(text, { chunkSize: 100, overlap: 60 });

  expect(chunks[0]).toHaveLength(100);
  expect(reconstruct(chunks, 60)).toBe(text);
});

test("chunk sequence is lazy and restartable", () => {
  const iterable = chunkText(makeSentences(100), { chunkSize: 300, overlap: 30 });

  const first = Array.from(iterable);
  const second = Array.from(iterable);
  expect(second).toEqual(first);

  const iterator = iterable[Symbol.iterator]();
  expect(iterator.next().value).toBe(first[0]);
});

test("overlap must be smaller than the chunk size", () => {
  expect(() => chunkText("text", { chunkSize: 100, overlap: 100 })).toThrow(RangeError);
  expect(() => chunkText("text", { chunkSize: 100, overlap: -1 })).toThrow(RangeError);
  expect(() => chunkText("text", { chunkSize: 0, overlap: 0 })).toThrow(RangeError);
});
