import type { FeedbackValue, FieldValue } from "../types/resources";
import type { Condition } from "../types/domain";

type ConditionField = "status" | "reason" | "message" | "lastTransitionTime";

/**
 * Naming rules for flattened status feedback. Condition fields are published
 * as `<ConditionType>-<Field>`; any name whose prefix appears in
 * `nonConditionPrefixes` is kept as a plain value even when its suffix looks
 * like a condition field (`Version-Status` is a version field, not a
 * condition called "Version").
 */
export type FeedbackRules = {
  conditionFields: Readonly<Record<string, ConditionField>>;
  nonConditionPrefixes: readonly string[];
};

export const DEFAULT_FEEDBACK_RULES: FeedbackRules = {
  conditionFields: {
    Status: "status",
    Reason: "reason",
    Message: "message",
    LastTransitionTime: "lastTransitionTime",
  },
  nonConditionPrefixes: ["Version"],
};

export type FlattenedFeedback = {
  conditions: Condition[];
  extras: Map<string, string>;
};

/**
 * Text form of a feedback value. `Integer` renders as a decimal, `Boolean` as
 * `true`/`false` and `JsonRaw` verbatim when their field is set; every other
 * case, including a missing or unknown tag, falls back to `string`.
 */
export function fieldValueText(value: FieldValue | null | undefined): string {
  if (!value) return "";
  switch (value.type) {
    case "Integer":
      return String(value.integer ?? 0);
    case "Boolean":
      if (typeof value.boolean === "boolean") return value.boolean ? "true" : "false";
      break;
    case "JsonRaw":
      if (typeof value.jsonRaw === "string") return value.jsonRaw;
      break;
  }
  return value.string ?? "";
}

function splitName(name: string): [string, string] | null {
  const i = name.indexOf("-");
  if (i < 0) return null;
  return [name.slice(0, i), name.slice(i + 1)];
}

/**
 * Group flat feedback values into conditions, in order of first appearance,
 * and collect everything else as extras keyed by their full name.
 *
 * The name is split on its first hyphen only, so a condition type that itself
 * contains a hyphen (`Foo-Bar-Status`) is not recognised and lands in extras.
 * When a field or an extra repeats, the first value seen is kept.
 */
export function flattenFeedback(
  values: readonly FeedbackValue[],
  rules: FeedbackRules = DEFAULT_FEEDBACK_RULES,
): FlattenedFeedback {
  const byType = new Map<string, Condition>();
  const seen = new Map<string, Set<ConditionField>>();
  const extras = new Map<string, string>();

  for (const fv of values) {
    const name = fv.name ?? "";
    const text = fieldValueText(fv.fieldValue);
    const parts = splitName(name);
    const field =
      parts && Object.hasOwn(rules.conditionFields, parts[1])
        ? rules.conditionFields[parts[1]]
        : undefined;

    if (!parts || !field || rules.nonConditionPrefixes.includes(parts[0])) {
      if (!extras.has(name)) extras.set(name, text);
      continue;
    }

    const [type] = parts;
    let condition = byType.get(type);
    let fields = seen.get(type);
    if (!condition || !fields) {
      condition = { type, status: "", reason: "", message: "", lastTransitionTime: "" };
      fields = new Set();
      byType.set(type, condition);
      seen.set(type, fields);
    }
    if (fields.has(field)) continue;
    fields.add(field);
    condition[field] = text;
  }

  // Map iteration follows insertion order, i.e. first appearance.
  return { conditions: [...byType.values()], extras };
}
