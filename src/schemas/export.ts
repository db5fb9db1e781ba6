import { z } from "zod";

export const exportFormatSchema = z.enum(["csv", "excel", "json"]);

export type ExportFormat = z.infer<typeof exportFormatSchema>;

export const DEFAULT_EXPORT_FORMAT: ExportFormat = "csv";

export interface ExportResult {
  written: boolean;
  count: number;
}
