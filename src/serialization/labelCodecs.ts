import { z } from "zod";

/** Outcome of decoding a single label. */
export type LabelParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Textual encoding of node values or edge weights inside TGF documents. A
 * label never contains a line break; {@link renderTgf} rejects those.
 */
export interface LabelCodec<T> {
  format(value: T): string;
  parse(label: string): LabelParseResult<T>;
}

/**
 * Builds a codec from a zod schema accepting the raw label. The first issue
 * reported by the schema becomes the failure reason.
 */
export function zodLabels<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  format: (value: T) => string = String,
): LabelCodec<T> {
  return {
    format,
    parse(label) {
      const parsed = schema.safeParse(label);
      if (parsed.success) {
        return { ok: true, value: parsed.data };
      }
      return { ok: false, reason: parsed.error.issues[0]?.message ?? "invalid label" };
    },
  };
}

/** Safe integers with an optional sign, e.g. `42`, `-7`, `+3`. */
export const IntegerLabelSchema = z
  .string()
  .regex(/^[-+]?\d+$/, "expected an integer")
  .transform((label) => Number(label))
  .refine(Number.isSafeInteger, "integer exceeds the safe range");

/** Any finite number literal accepted by `Number()`. */
export const NumberLabelSchema = z
  .string()
  .trim()
  .min(1, "expected a number")
  .transform((label) => Number(label))
  .refine(Number.isFinite, "expected a finite number");

/** Labels kept verbatim. */
export const stringLabels: LabelCodec<string> = {
  format: (value) => value,
  parse: (label) => ({ ok: true, value: label }),
};

export const integerLabels: LabelCodec<number> = zodLabels(IntegerLabelSchema);

/**
 * Finite numbers only: `NaN` and the infinities format to labels the parser
 * rejects. `-0` is written as `"-0"` so it survives a round trip.
 */
export const numberLabels: LabelCodec<number> = zodLabels(NumberLabelSchema, (value) =>
  Object.is(value, -0) ? "-0" : String(value),
);

/**
 * Weights that carry no information: edges render without a label and every
 * label, empty or not, decodes to `null`.
 */
export const unitLabels: LabelCodec<null> = {
  format: () => "",
  parse: () => ({ ok: true, value: null }),
};
