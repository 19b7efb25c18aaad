import { mkdtemp, readdir, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { RawProduct } from "../types.js";
import { CSV_COLUMNS, CsvStorage, escapeCsvField } from "./csv-storage.js";

const HEADER = CSV_COLUMNS.join(",");

const milk: RawProduct = {
  id: "p1",
  name: "Lettmelk",
  info: "1% fett, 1,75 l, TINE",
  price: 20.9,
  priceText: "kr 20,90",
  category: "melk",
  attributes: { fat_content: 1 },
  scrapedAt: new Date("2024-05-17T10:00:00.000Z"),
  runId: "r1",
};

const MILK_ROW =
  'p1,Lettmelk,,"1% fett, 1,75 l, TINE",20.9,"kr 20,90",,,melk,,,"{""fat_content"":1}",2024-05-17T10:00:00.000Z,r1';

describe("escapeCsvField", () => {
  it("quotes only when needed", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
  });
});

describe("CsvStorage", () => {
  let dir: string;
  let storage: CsvStorage;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    dir = join(await mkdtemp(join(tmpdir(), "csv-storage-")), "out");
    storage = new CsvStorage({ outputDir: dir, filenamePrefix: "products", now: () => new Date(2024, 4, 17) });
    await storage.initialize();
  });

  it("writes one file per category with a header", async () => {
    await expect(storage.saveProducts([milk, { ...milk, id: "p2", category: undefined }])).resolves.toBe(2);

    expect((await readdir(dir)).sort()).toEqual([
      "products_melk_2024-05-17.csv",
      "products_uncategorized_2024-05-17.csv",
    ]);
    const content = await readFile(join(dir, "products_melk_2024-05-17.csv"), "utf-8");
    expect(content).toBe(`${HEADER}\n${MILK_ROW}\n`);
  });

  it("appends to an existing file", async () => {
    await storage.saveProducts([milk]);
    await storage.saveProducts([milk]);
    const content = await readFile(storage.fileFor("melk"), "utf-8");
    expect(content).toBe(`${HEADER}\n${MILK_ROW}\n${MILK_ROW}\n`);
  });

  it("rewrites the file when replacing", async () => {
    await storage.saveProducts([milk]);
    await storage.saveProducts([milk], { replaceExisting: true });
    const content = await readFile(storage.fileFor("melk"), "utf-8");
    expect(content).toBe(`${HEADER}\n${MILK_ROW}\n`);
  });

  it("saves nothing for an empty batch", async () => {
    await expect(storage.saveProducts([])).resolves.toBe(0);
    expect(await readdir(dir)).toEqual([]);
  });

  it("clears only its own files", async () => {
    await storage.saveProducts([milk]);
    await writeFile(join(dir, "notes.txt"), "x");
    await writeFile(join(dir, "other.csv"), "x");

    await storage.clear();
    expect((await readdir(dir)).sort()).toEqual(["notes.txt", "other.csv"]);
  });

  it("clears a missing directory without error", async () => {
    const missing = new CsvStorage({ outputDir: join(dir, "nope"), filenamePrefix: "products" });
    await expect(missing.clear()).resolves.toBeUndefined();
  });
});
