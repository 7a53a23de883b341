import { z } from "zod";
import { KeytrailError } from "./errors.js";

const ColorSchema = z.object({
  r: z.number().min(0).max(1),
  g: z.number().min(0).max(1),
  b: z.number().min(0).max(1),
  a: z.number().min(0).max(1).default(1),
});

export type Color = z.infer<typeof ColorSchema>;

function color(r: number, g: number, b: number): Color {
  return { r, g, b, a: 1 };
}

export const MotionPathSettingsSchema = z.object({
  framesBack: z.number().int().nonnegative().default(20),
  framesFront: z.number().int().nonnegative().default(20),
  playbackStart: z.number().default(1),
  playbackEnd: z.number().default(120),

  drawTimeInterval: z.number().positive().default(1),
  drawFrameInterval: z.number().int().default(1),
  drawKeyframeCount: z.number().int().nonnegative().default(5),

  strokeMode: z.enum(["closest", "spread"]).default("closest"),
  strokeMaxWorseSteps: z.number().int().nonnegative().default(5),
  strokeSampleDistance: z.number().nonnegative().default(8),

  parallelThreshold: z.number().int().positive().default(50),
  tangentTimeDelta: z.number().positive().default(0.01),
  usePivots: z.boolean().default(true),
  drawMode: z.enum(["world", "camera"]).default("world"),

  showPath: z.boolean().default(true),
  showKeyframes: z.boolean().default(true),
  showRotationKeyframes: z.boolean().default(true),
  showTangents: z.boolean().default(true),
  showKeyframeNumbers: z.boolean().default(false),
  showFrameNumbers: z.boolean().default(false),
  alternatingFrames: z.boolean().default(false),

  pathSize: z.number().positive().default(3),
  frameSize: z.number().positive().default(7),
  keyframeLabelSize: z.number().positive().default(14),
  frameLabelSize: z.number().positive().default(11),

  pathColor: ColorSchema.default(color(0, 0.6, 1)),
  currentFrameColor: ColorSchema.default(color(1, 1, 0)),
  tangentColor: ColorSchema.default(color(1, 0.5, 0)),
  brokenTangentColor: ColorSchema.default(color(1, 0.1, 0.1)),
  bufferPathColor: ColorSchema.default(color(0.4, 0.4, 0.4)),
  weightedPathColor: ColorSchema.default(color(0.6, 0.2, 1)),
  weightedPathTangentColor: ColorSchema.default(color(0.8, 0.5, 1)),
  frameLabelColor: ColorSchema.default(color(0.9, 0.9, 0.9)),
  keyframeLabelColor: ColorSchema.default(color(1, 1, 1)),
  previewPathColor: ColorSchema.default(color(1, 0.55, 0)),
  previewKeyframeColor: ColorSchema.default(color(1, 0.8, 0.2)),
});

export type MotionPathSettings = Readonly<z.infer<typeof MotionPathSettingsSchema>>;
export type MotionPathSettingsInput = z.input<typeof MotionPathSettingsSchema>;

export const KEYFRAME_SIZE_MULTIPLIER = 1.5;
export const CURRENT_FRAME_SIZE_MULTIPLIER = 2.2;
export const SELECTED_KEY_SIZE_MULTIPLIER = 1.2;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate overrides against the schema and return a frozen snapshot.
 * Every pass reads settings from a snapshot, never from shared state.
 */
export function createSettings(overrides: MotionPathSettingsInput = {}): MotionPathSettings {
  const parsed = MotionPathSettingsSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new KeytrailError("invalid-settings", describeIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}

export function withSettings(base: MotionPathSettings, overrides: MotionPathSettingsInput): MotionPathSettings {
  return createSettings({ ...base, ...overrides });
}

const ENV_NUMBERS = {
  KEYTRAIL_FRAMES_BACK: "framesBack",
  KEYTRAIL_FRAMES_FRONT: "framesFront",
  KEYTRAIL_DRAW_KEYFRAME_COUNT: "drawKeyframeCount",
  KEYTRAIL_DRAW_FRAME_INTERVAL: "drawFrameInterval",
  KEYTRAIL_STROKE_MAX_WORSE_STEPS: "strokeMaxWorseSteps",
  KEYTRAIL_PARALLEL_THRESHOLD: "parallelThreshold",
} as const;

/** Settings overrides taken from `KEYTRAIL_*` environment variables. */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): MotionPathSettings {
  const overrides: Record<string, unknown> = {};
  for (const [variable, key] of Object.entries(ENV_NUMBERS)) {
    const raw = env[variable];
    if (raw !== undefined && raw !== "") overrides[key] = Number(raw);
  }
  if (env.KEYTRAIL_STROKE_MODE) overrides.strokeMode = env.KEYTRAIL_STROKE_MODE;
  if (env.KEYTRAIL_DRAW_MODE) overrides.drawMode = env.KEYTRAIL_DRAW_MODE;
  if (env.KEYTRAIL_USE_PIVOTS) overrides.usePivots = env.KEYTRAIL_USE_PIVOTS === "1";

  const parsed = MotionPathSettingsSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new KeytrailError("invalid-settings", describeIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}
