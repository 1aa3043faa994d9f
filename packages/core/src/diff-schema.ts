import { Schema } from "effect";

export const DiffLineTypeSchema = Schema.Literal(
  "match",
  "modified",
  "onlyInOriginal",
  "onlyInGhost"
);

export const DiffLineSchema = Schema.Struct({
  type: DiffLineTypeSchema,
  originalIndex: Schema.optional(Schema.Number),
  ghostIndex: Schema.optional(Schema.Number),
  originalText: Schema.optional(Schema.String),
  ghostText: Schema.optional(Schema.String),
});

export const CollapsedSectionSchema = Schema.Struct({
  id: Schema.Number,
  start: Schema.Number,
  end: Schema.Number,
  lineCount: Schema.Number,
  preview: Schema.String,
});

export const DiffReportSchema = Schema.Struct({
  version: Schema.Literal("0.1.0"),
  lines: Schema.Array(DiffLineSchema),
  sections: Schema.Array(CollapsedSectionSchema),
  summary: Schema.Struct({
    differenceCount: Schema.Number,
    differenceIndices: Schema.Array(Schema.Number),
  }),
});

export type DiffReport = Schema.Schema.Type<typeof DiffReportSchema>;
