import { z } from "zod";

export const SeveritySchema = z.enum(["low", "medium", "high"]);

export type Severity = z.infer<typeof SeveritySchema>;

export const FindingCategorySchema = z.enum([
  "open_port",
  "missing_security_header",
  "tls_certificate",
]);

export type FindingCategory = z.infer<typeof FindingCategorySchema>;

export const FindingSchema = z.object({
  category: FindingCategorySchema,
  /** Port spec, URL scheme or scan target, depending on category. */
  target: z.string(),
  severity: SeveritySchema,
  title: z.string(),
  details: z.string(),
  service: z.string().optional(),
});

export type Finding = z.infer<typeof FindingSchema>;

export const SeveritySummarySchema = z.object({
  high: z.number().int().nonnegative(),
  medium: z.number().int().nonnegative(),
  low: z.number().int().nonnegative(),
});

export type SeveritySummary = z.infer<typeof SeveritySummarySchema>;

export const ScanSettingsSchema = z.object({
  /** Seconds. Base timeout for DNS and the port scan. */
  timeout: z.number().int().min(1).max(120),
  httpTimeout: z.number().int().min(1),
  tlsTimeout: z.number().int().min(1),
  nmapArgs: z.string(),
  dns: z.boolean(),
  http: z.boolean(),
  tls: z.boolean(),
  nmap: z.boolean(),
});

export type ScanSettings = z.infer<typeof ScanSettingsSchema>;

export const ReportFormatSchema = z.enum(["json", "html", "both"]);

export type ReportFormat = z.infer<typeof ReportFormatSchema>;
