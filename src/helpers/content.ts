import { readFileSync } from "node:fs";
import type { IntroArt, PortfolioCatalog, PortfolioEntry } from "../types.js";

const PORTFOLIO_FILE = new URL("../../content/portfolio.json", import.meta.url);
const INTRO_FILE = new URL("../../content/intro.json", import.meta.url);

const LINK_RE = /^[a-z][a-z0-9+.-]*:\/\//i;

export class CatalogError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`${path}: ${detail}`);
    this.name = "CatalogError";
    this.path = path;
  }
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string") throw new CatalogError(path, "expected a string");
  return value;
}

function expectNonEmptyString(value: unknown, path: string): string {
  const text = expectString(value, path);
  if (text.trim().length === 0) throw new CatalogError(path, "must not be empty");
  return text;
}

function expectLines(value: unknown, path: string): readonly string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new CatalogError(path, "expected a non-empty array of lines");
  }
  return Object.freeze(value.map((line, index) => expectString(line, `${path}[${String(index)}]`)));
}

function parseEntry(value: unknown, path: string): PortfolioEntry {
  if (!isRecord(value)) throw new CatalogError(path, "expected an object");
  return Object.freeze({
    id: expectNonEmptyString(value.id, `${path}.id`),
    label: expectNonEmptyString(value.label, `${path}.label`),
    body: expectString(value.body, `${path}.body`),
  });
}

function parseArt(value: unknown): IntroArt {
  if (!isRecord(value)) throw new CatalogError("intro", "expected an object");
  return Object.freeze({
    first: expectLines(value.first, "intro.first"),
    second: expectLines(value.second, "intro.second"),
    third: expectLines(value.third, "intro.third"),
    pressAnyKey: expectLines(value.pressAnyKey, "intro.pressAnyKey"),
  });
}

export function parseCatalog(portfolio: unknown, intro: unknown): PortfolioCatalog {
  if (!isRecord(portfolio)) throw new CatalogError("portfolio", "expected an object");

  const rawEntries = portfolio.entries;
  if (!Array.isArray(rawEntries) || rawEntries.length === 0) {
    throw new CatalogError("portfolio.entries", "expected a non-empty array");
  }
  const entries = rawEntries.map((entry, index) =>
    parseEntry(entry, `portfolio.entries[${String(index)}]`),
  );

  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      throw new CatalogError(`portfolio.entries[${String(index)}].id`, `duplicate id "${entry.id}"`);
    }
    seen.add(entry.id);
  });

  return Object.freeze({
    titles: expectLines(portfolio.titles, "portfolio.titles"),
    entries: Object.freeze(entries),
    art: parseArt(intro),
  });
}

function readJson(file: URL): unknown {
  const raw = readFileSync(file, "utf8");
  try {
    return JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CatalogError(file.pathname, `invalid JSON (${detail})`);
  }
}

export function loadCatalog(): PortfolioCatalog {
  return parseCatalog(readJson(PORTFOLIO_FILE), readJson(INTRO_FILE));
}

export function splitContentLines(body: string): readonly string[] {
  return Object.freeze(body.split("\n"));
}

export function lineCount(entry: PortfolioEntry | undefined): number {
  if (!entry) return 0;
  return splitContentLines(entry.body).length;
}

export function isLinkLine(line: string): boolean {
  return LINK_RE.test(line);
}
