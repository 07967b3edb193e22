import fs from 'fs/promises';
import { z } from 'zod';
import type { Stock } from './types.js';

const StockSchema = z.object({
  symbol: z.string(),
  name: z.string().optional(),
  sector: z.string().optional(),
  industry: z.string().optional(),
});

const StockFileSchema = z.object({
  Stocks: z.array(StockSchema),
});

/** Trims symbols, drops blanks, keeps the first occurrence of duplicates. */
export function parseStockList(json: unknown): Stock[] {
  const parsed = StockFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    throw new Error(`invalid stock list at ${where}: ${issue?.message ?? 'schema mismatch'}`);
  }

  const seen = new Set<string>();
  const out: Stock[] = [];
  for (const s of parsed.data.Stocks) {
    const symbol = s.symbol.trim();
    if (!symbol || seen.has(symbol)) continue;
    seen.add(symbol);
    out.push({ ...s, symbol });
  }
  return out;
}

export async function loadSymbolsFromFile(file: string): Promise<Stock[]> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    throw new Error(`failed to read stock list ${file}: ${String(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`failed to parse stock list ${file}: ${String(err)}`);
  }

  try {
    return parseStockList(json);
  } catch (err) {
    throw new Error(`${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
