import { z } from "zod";

export const MODES = ["download", "analyze", "palette"] as const;
export const ANALYSIS_TYPES = ["color", "minimalism", "emotion"] as const;

export const AnalysisTypeSchema = z.enum(ANALYSIS_TYPES);
export type AnalysisType = z.infer<typeof AnalysisTypeSchema>;

const optionalPath = z.string().min(1).optional();

export const CliCommandSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("download"), input: optionalPath }),
  z.object({ mode: z.literal("analyze"), type: AnalysisTypeSchema }),
  z.object({ mode: z.literal("palette") }),
]);

export type CliCommand = z.infer<typeof CliCommandSchema>;
