import { z } from "zod";

export const KNOWN_STATE_FILE_TYPES = ["PowerController", "LightingControl", "TempProbes", "OutputMetering"] as const;

export type KnownStateFileType = (typeof KNOWN_STATE_FILE_TYPES)[number];
export type StateFileType = KnownStateFileType | "Unknown";

export function isKnownStateFileType(value: unknown): value is KnownStateFileType {
  return KNOWN_STATE_FILE_TYPES.some((known) => known === value);
}

const JsonObjectSchema = z.record(z.string(), z.unknown());

// ==================== Load-time documents ====================
// Fields a producer may add later are kept through passthrough(). A typed field holding a
// value of another type reads as absent; the document itself is still loaded.

function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

/** Array whose malformed rows are dropped */
function lenientRows<T extends z.ZodTypeAny>(row: T) {
  return z
    .array(z.unknown())
    .transform((items) =>
      items.flatMap((item): z.infer<T>[] => {
        const parsed = row.safeParse(item);
        return parsed.success ? [parsed.data] : [];
      })
    )
    .nullable()
    .optional()
    .catch(undefined);
}

export const BaseDocumentSchema = z.object({
  StateFileType: lenient(z.string()),
  DeviceName: lenient(z.string()),
  SchemaVersion: lenient(z.number()),
  SaveTime: lenient(z.string().nullable()),
}).passthrough();

export const PowerOutputSchema = z.object({
  Type: lenient(z.string()),
  IsOn: lenient(z.boolean()),
}).passthrough();

export const PowerControllerDocumentSchema = BaseDocumentSchema.extend({
  StateFileType: z.literal("PowerController"),
  Output: lenient(PowerOutputSchema),
  Scheduler: lenient(JsonObjectSchema),
}).passthrough();

export const LightingControlDocumentSchema = BaseDocumentSchema.extend({
  StateFileType: z.literal("LightingControl"),
  LastStateSaveTime: lenient(z.string().nullable()),
  RandomOffsets: lenient(JsonObjectSchema),
  SwitchStates: lenient(z.array(z.unknown())),
}).passthrough();

export const ProbeReadingSchema = z.object({
  Timestamp: lenient(z.string().nullable()),
  ProbeName: lenient(z.string().nullable()),
  Temperature: lenient(z.number().nullable()),
}).passthrough();

export const ProbeConfigSchema = z.object({
  Name: z.string(),
  DisplayName: lenient(z.string()),
  Colour: lenient(z.string().nullable()),
}).passthrough();

export const ChartConfigSchema = z.object({
  Name: lenient(z.string()),
  DaysToShow: lenient(z.number().positive()),
  Probes: lenientRows(z.string()),
}).passthrough();

export const TempProbesDocumentSchema = BaseDocumentSchema.extend({
  StateFileType: z.literal("TempProbes"),
  TempProbeLogging: lenient(z.object({
    probes: lenientRows(ProbeConfigSchema),
    history: lenientRows(ProbeReadingSchema),
  }).passthrough()),
  Charting: lenient(z.object({
    Enable: lenient(z.boolean()),
    Charts: lenientRows(ChartConfigSchema),
  }).passthrough()),
}).passthrough();

export const OutputMeteringDocumentSchema = BaseDocumentSchema.extend({
  StateFileType: z.literal("OutputMetering"),
  Summary: lenient(JsonObjectSchema),
  Meters: lenient(z.array(z.unknown())),
}).passthrough();

export type BaseDocument = z.infer<typeof BaseDocumentSchema>;
export type PowerControllerDocument = z.infer<typeof PowerControllerDocumentSchema>;
export type LightingControlDocument = z.infer<typeof LightingControlDocumentSchema>;
export type TempProbesDocument = z.infer<typeof TempProbesDocumentSchema>;
export type OutputMeteringDocument = z.infer<typeof OutputMeteringDocumentSchema>;
export type ProbeReading = z.infer<typeof ProbeReadingSchema>;
export type ProbeConfig = z.infer<typeof ProbeConfigSchema>;
export type ChartConfig = z.infer<typeof ChartConfigSchema>;

/** Typed view of a device document, one variant per state file type */
export type DevicePayload =
  | { kind: "PowerController"; document: PowerControllerDocument }
  | { kind: "LightingControl"; document: LightingControlDocument }
  | { kind: "TempProbes"; document: TempProbesDocument }
  | { kind: "OutputMetering"; document: OutputMeteringDocument }
  | { kind: "Unknown"; document: BaseDocument };

export type DecodeResult =
  | { ok: true; payload: DevicePayload }
  | { ok: false; message: string };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function decodeWith<K extends DevicePayload["kind"], S extends z.ZodTypeAny>(
  kind: K,
  schema: S,
  raw: Record<string, unknown>,
  wrap: (document: z.infer<S>) => DevicePayload
): DecodeResult {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, message: `${kind}: ${describeIssues(parsed.error)}` };
  }
  return { ok: true, payload: wrap(parsed.data) };
}

/** Classify a parsed document by StateFileType and read the typed fields it carries. */
export function decodeDevicePayload(raw: Record<string, unknown>): DecodeResult {
  const type = raw["StateFileType"];
  switch (type) {
    case "PowerController":
      return decodeWith(type, PowerControllerDocumentSchema, raw, (document) => ({ kind: type, document }));
    case "LightingControl":
      return decodeWith(type, LightingControlDocumentSchema, raw, (document) => ({ kind: type, document }));
    case "TempProbes":
      return decodeWith(type, TempProbesDocumentSchema, raw, (document) => ({ kind: type, document }));
    case "OutputMetering":
      return decodeWith(type, OutputMeteringDocumentSchema, raw, (document) => ({ kind: type, document }));
    default:
      return decodeWith("Unknown", BaseDocumentSchema.extend({ StateFileType: z.unknown() }), raw, (document) => ({
        kind: "Unknown",
        document: { ...document, StateFileType: typeof document.StateFileType === "string" ? document.StateFileType : undefined },
      }));
  }
}

// ==================== Ingestion ====================

type RequiredKeyType = "string" | "integer" | "object" | "array";

const REQUIRED_KEY_SCHEMAS: Record<RequiredKeyType, z.ZodTypeAny> = {
  string: z.string(),
  integer: z.number().int(),
  object: JsonObjectSchema,
  array: z.array(z.unknown()),
};

/** Keys a submitted document must carry, checked in this order */
export const REQUIRED_SUBMIT_KEYS: Record<KnownStateFileType, ReadonlyArray<readonly [string, RequiredKeyType]>> = {
  PowerController: [
    ["SaveTime", "string"],
    ["SchemaVersion", "integer"],
    ["DeviceName", "string"],
    ["Output", "object"],
    ["Scheduler", "object"],
  ],
  LightingControl: [
    ["LastStateSaveTime", "string"],
    ["SchemaVersion", "integer"],
    ["DeviceName", "string"],
    ["RandomOffsets", "object"],
    ["SwitchStates", "array"],
  ],
  TempProbes: [
    ["SaveTime", "string"],
    ["SchemaVersion", "integer"],
    ["DeviceName", "string"],
    ["TempProbeLogging", "object"],
  ],
  OutputMetering: [
    ["SaveTime", "string"],
    ["SchemaVersion", "integer"],
    ["DeviceName", "string"],
    ["Summary", "object"],
    ["Meters", "array"],
  ],
};

const submitSchemas = new Map<KnownStateFileType, z.ZodTypeAny>(
  KNOWN_STATE_FILE_TYPES.map((type) => [
    type,
    z.object(Object.fromEntries(REQUIRED_SUBMIT_KEYS[type].map(([key, kind]) => [key, REQUIRED_KEY_SCHEMAS[kind]]))).passthrough(),
  ])
);

export type SubmitValidation =
  | { ok: true; stateFileType: KnownStateFileType; deviceName: string; document: Record<string, unknown> }
  | { ok: false; message: string };

/** Validate a document received by the ingestion endpoint. Only the first problem is reported. */
export function validateSubmittedDocument(document: Record<string, unknown>): SubmitValidation {
  const type = document["StateFileType"];
  if (!isKnownStateFileType(type)) {
    return { ok: false, message: `Invalid state file type: ${type === undefined ? "(missing)" : String(type)}` };
  }

  const schema = submitSchemas.get(type);
  if (schema) {
    const parsed = schema.safeParse(document);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const key = issue ? String(issue.path[0] ?? "") : "";
      if (issue && issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
        return { ok: false, message: `Missing required key: ${key}` };
      }
      const expected = REQUIRED_SUBMIT_KEYS[type].find(([name]) => name === key)?.[1] ?? "value";
      return { ok: false, message: `Invalid type for key: ${key}. Expected ${expected}.` };
    }
  }

  const deviceName = document["DeviceName"];
  return {
    ok: true,
    stateFileType: type,
    deviceName: typeof deviceName === "string" ? deviceName : "",
    document,
  };
}
