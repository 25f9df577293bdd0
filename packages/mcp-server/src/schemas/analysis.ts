import { z } from "zod";

const SessionIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]+$/, "Session ids use letters, digits, '_', '.' and '-' only")
  .describe("Existing session id, e.g. session_20250101_120000_ab12cd34");

const CompanyNameSchema = z
  .string()
  .trim()
  .min(1, "Company name must not be empty")
  .max(200)
  .describe("Company name as it would appear in a web search, e.g. Notion");

export const AnalyzeCompanySchema = z.object({
  company: CompanyNameSchema,
  session_id: SessionIdSchema.optional().describe(
    "Continue this session instead of starting a new one",
  ),
  fetch_pages: z
    .boolean()
    .optional()
    .describe("Read the top search hits' pages during research (default: configured value)"),
});

export const CompareCompaniesSchema = z.object({
  companies: z
    .array(CompanyNameSchema)
    .min(2, "Compare at least 2 companies")
    .max(5, "Compare at most 5 companies")
    .describe("Companies to analyze and compare (2-5)"),
  concurrency: z.coerce
    .number()
    .int()
    .min(1)
    .max(5)
    .optional()
    .describe("Companies analyzed at once (default: configured value)"),
  session_id: SessionIdSchema.optional().describe(
    "Continue this session instead of starting a new one",
  ),
  fetch_pages: z
    .boolean()
    .optional()
    .describe("Read the top search hits' pages during research"),
});

export const GetSessionSchema = z.object({
  session_id: SessionIdSchema,
  recent: z.coerce
    .number()
    .int()
    .min(0)
    .max(100)
    .default(10)
    .describe("How many of the most recent messages to include"),
});

export type AnalyzeCompanyInput = z.infer<typeof AnalyzeCompanySchema>;
export type CompareCompaniesInput = z.infer<typeof CompareCompaniesSchema>;
export type GetSessionInput = z.infer<typeof GetSessionSchema>;
