export const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "OPTIONS",
  "TRACE",
  "CONNECT",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type StaticParamValue = string | number | boolean;

export type RequestTemplate = {
  name: string;
  method: HttpMethod;
  url: string;
  params: Record<string, StaticParamValue>; // defaults shown in the UI
  download: boolean;                        // UI saves the response as a file
};

/** A caller addresses a template either by name or by its position in the list. */
export type TemplateRef =
  | { kind: "name"; name: string }
  | { kind: "index"; index: number };

export type Invocation = {
  ref: TemplateRef;
  params: Record<string, JsonValue>;
};

export function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}
