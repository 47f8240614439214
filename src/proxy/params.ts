import { MalformedRequestError } from "../errors";
import type { JsonValue } from "../model/template";

export type ParamValue =
  | { kind: "string"; value: string }
  | { kind: "integer"; value: number }
  | { kind: "other"; value: JsonValue };

export function classifyParam(value: JsonValue): ParamValue {
  if (typeof value === "string") return { kind: "string", value };
  if (typeof value === "number" && Number.isSafeInteger(value)) return { kind: "integer", value };
  return { kind: "other", value };
}

/**
 * Query-string text for one runtime parameter.
 * Only strings and integers have a query form; anything else is rejected.
 */
export function stringifyQueryParam(key: string, value: JsonValue): string {
  const param = classifyParam(value);
  switch (param.kind) {
    case "string":
      return param.value;
    case "integer":
      return param.value.toString(10);
    case "other":
      throw new MalformedRequestError(
        `Parameter "${key}" must be a string or an integer to be sent in a query string, got ${describeValue(param.value)}`
      );
  }
}

function describeValue(value: JsonValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  if (typeof value === "number") return `the number ${value}`;
  if (typeof value === "object") return "an object";
  return `a ${typeof value}`;
}
