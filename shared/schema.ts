import { z } from "zod";

// ============== PROCESS HEALTH ==============
export const OVERALL_STATUSES = ["HEALTHY", "MODERATE_RISK", "HIGH_RISK", "UNKNOWN"] as const;
export const ENERGY_CONCENTRATION_STATUSES = ["STABLE", "WARNING", "UNSTABLE", "UNKNOWN"] as const;
export const CATEGORY_BALANCE_STATUSES = ["BALANCED", "MOTION_DOMINANT", "GAS_DOMINANT", "UNKNOWN"] as const;
export const RISK_TIERS = ["HEALTHY", "MODERATE_RISK", "HIGH_RISK"] as const;

export const OverallStatusZ = z.enum(OVERALL_STATUSES);
export const EnergyConcentrationStatusZ = z.enum(ENERGY_CONCENTRATION_STATUSES);
export const CategoryBalanceStatusZ = z.enum(CATEGORY_BALANCE_STATUSES);
export const RiskTierZ = z.enum(RISK_TIERS);

export type OverallStatus = z.infer<typeof OverallStatusZ>;
export type EnergyConcentrationStatus = z.infer<typeof EnergyConcentrationStatusZ>;
export type CategoryBalanceStatus = z.infer<typeof CategoryBalanceStatusZ>;
export type RiskTier = z.infer<typeof RiskTierZ>;

export const HealthRecordZ = z.object({
  overall_status: OverallStatusZ,
  health_score: z.number(),
  energy_concentration_status: EnergyConcentrationStatusZ,
  mode1_energy_pct: z.number(),
  category_balance_status: CategoryBalanceStatusZ,
  critical_issues: z.array(z.string()),
  warnings: z.array(z.string()),
  recommendation: z.string(),
});

export type HealthRecord = z.infer<typeof HealthRecordZ>;

export const ComponentSummaryZ = z.object({
  total_components: z.number().int().min(0),
  problematic_count: z.number().int().min(0),
  problematic_ratio: z.number().min(0).max(100),
});

export type ComponentSummary = z.infer<typeof ComponentSummaryZ>;

// ============== GENERATION ==============
export const MODEL_KEYS = ["fast", "default", "powerful"] as const;
export const ModelKeyZ = z.enum(MODEL_KEYS);
export type ModelKey = z.infer<typeof ModelKeyZ>;

export const MODEL_LABELS: Record<ModelKey, string> = {
  fast: "Simple (fast)",
  default: "Standard",
  powerful: "Advanced",
};

export const ANALYSIS_TYPES = ["full", "brief"] as const;
export const AnalysisTypeZ = z.enum(ANALYSIS_TYPES);
export type AnalysisType = z.infer<typeof AnalysisTypeZ>;

// Caller-supplied placeholder values (process type, machine, material, ...)
export const ReportContextZ = z.record(z.string(), z.union([z.string(), z.number()]));
export type ReportContext = z.infer<typeof ReportContextZ>;

export const GenerateReportFieldsZ = z.object({
  analysisType: AnalysisTypeZ.default("full"),
  /** Falls back to the configured default model when omitted */
  modelKey: ModelKeyZ.optional(),
  context: z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (!raw || raw.trim() === "") return {};
      try {
        const parsed = ReportContextZ.safeParse(JSON.parse(raw));
        if (parsed.success) return parsed.data;
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "context must map names to strings or numbers" });
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "context is not valid JSON" });
      }
      return z.NEVER;
    }),
});

export type GenerateReportFields = z.infer<typeof GenerateReportFieldsZ>;

// ============== EXPORT ==============
export const ReportDocumentZ = z.object({
  timestamp: z.string(),
  model: ModelKeyZ,
  analysis_type: AnalysisTypeZ,
  process_health: HealthRecordZ.nullable(),
  report: z.string(),
});

export type ReportDocument = z.infer<typeof ReportDocumentZ>;

export const ExportRequestZ = z.object({
  format: z.enum(["markdown", "json"]),
  generatedAt: z.string().datetime().optional(),
  modelKey: ModelKeyZ,
  analysisType: AnalysisTypeZ,
  processHealth: HealthRecordZ.nullable().default(null),
  report: z.string().min(1),
});

export type ExportRequest = z.infer<typeof ExportRequestZ>;
