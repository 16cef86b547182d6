import type { QueryModel } from "./query-model";

/**
 * Ad-hoc filter actions sent when a user clicks a label in the log view.
 */
export interface QueryFixAction {
  type: "ADD_FILTER" | "ADD_FILTER_OUT";
  options?: {
    key?: string;
    value?: string;
  };
}

// Levels without a severity of the same name
const LEVEL_TO_SEVERITY: Record<string, string> = {
  debug: "DEFAULT",
  critical: "EMERGENCY",
};

/**
 * Append a `key="value"` (or `key!="value"`) clause for the clicked label.
 * The `id` and `level` labels map back to the insertId and severity fields.
 */
export function modifyQuery(query: QueryModel, action: QueryFixAction): QueryModel {
  const key = action.options?.key;
  const value = action.options?.value;
  if (!key || !value) {
    return { ...query };
  }

  const operator = action.type === "ADD_FILTER" ? "=" : "!=";
  let field = key;
  let fieldValue = value;

  if (key === "id") {
    field = "insertId";
  } else if (key === "level") {
    field = "severity";
    fieldValue = LEVEL_TO_SEVERITY[value] ?? value;
  }

  return {
    ...query,
    queryText: `${query.queryText}\n${field}${operator}"${escapeLabelValue(fieldValue)}"`,
  };
}

// Escapes backslash, newline and double quote.
export function escapeLabelValue(labelValue: string): string {
  return labelValue.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}
