import Papa from "papaparse";
import { z } from "zod";

export type ParseReport<T> = {
  rows: T[];
  errors: { row: number; message: string }[];
  rowCount: number;
  droppedRows: number;
  unknownColumns: string[];
};

// CSV text -> validated rows, with header aliasing; bad rows are reported, not thrown
export function parseCsv<T extends z.ZodRawShape>(
  text: string,
  schema: z.ZodObject<T>,
  aliases: Record<string, string>
): ParseReport<z.infer<z.ZodObject<T>>> {
  const lowered = new Map(Object.entries(aliases).map(([k, v]) => [k.toLowerCase(), v] as const));
  const res = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
  });

  const rows: z.infer<z.ZodObject<T>>[] = [];
  const errors: { row: number; message: string }[] = res.errors.map((e) => ({
    row: (e.row ?? -1) + 1,
    message: e.message,
  }));
  let droppedRows = 0;

  const headers = (res.meta.fields ?? []).map((h) => h.trim());
  const unknownColumns = headers.filter((h) => !lowered.has(h.toLowerCase()));

  res.data.forEach((raw, idx) => {
    // Map aliases → canonical keys
    const mapped: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(raw)) {
      const target = lowered.get(key.trim().toLowerCase());
      if (!target) continue;
      mapped[target] = val;
    }

    const parsed = schema.safeParse(mapped);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      droppedRows += 1;
      const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      errors.push({ row: idx + 1, message: msg });
    }
  });

  return {
    rows,
    errors,
    rowCount: res.data.length,
    droppedRows,
    unknownColumns,
  };
}
