import { parse } from "csv-parse/sync";
import * as ExcelJS from "exceljs";
import { Readable } from "stream";
import { z } from "zod";
import { decodeText } from "./text";
import type { NormalizedDocument, NormalizedSection } from "../types";

const csvRecordsSchema = z.array(z.array(z.string()));

/**
 * Flatten a table row-wise: the first row is the header and every later row
 * becomes one line of `header: value` pairs.
 */
export function flattenRows(rows: string[][]): string {
  const nonEmpty = rows.filter(row => row.some(cell => cell.trim().length > 0));
  if (nonEmpty.length === 0) return "";

  const [header, ...body] = nonEmpty;
  if (body.length === 0) {
    return header.map(cell => cell.trim()).join(" | ");
  }

  return body
    .map(row =>
      row
        .map((cell, i) => {
          const value = cell.trim();
          if (value.length === 0) return null;
          const name = header[i]?.trim();
          return name ? `${name}: ${value}` : value;
        })
        .filter((pair): pair is string => pair !== null)
        .join(" | "),
    )
    .filter(line => line.length > 0)
    .join("\n");
}

export async function extractCsv(bytes: Buffer): Promise<NormalizedDocument> {
  const records = csvRecordsSchema.parse(
    parse(decodeText(bytes), {
      relax_column_count: true,
      skip_empty_lines: true,
    }),
  );

  return {
    type: "tabular",
    sections: [{ text: flattenRows(records), metadata: {} }],
  };
}

export async function extractXlsx(bytes: Buffer): Promise<NormalizedDocument> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.read(Readable.from([bytes]));

  const sections: NormalizedSection[] = [];
  workbook.eachSheet(worksheet => {
    const rows: string[][] = [];
    worksheet.eachRow(row => {
      const cells: string[] = [];
      row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
        cells[colNumber - 1] = cell.text;
      });
      rows.push(Array.from(cells, cell => cell ?? ""));
    });

    const text = flattenRows(rows);
    if (text.length > 0) {
      sections.push({ text, metadata: { sheet: worksheet.name } });
    }
  });

  return { type: "tabular", sections };
}
