/**
 * PromptTemplate: parses prompt text with named placeholders and renders
 * it against a map of values.
 *
 * Templates use single-brace tokens:
 *   {name}        replaced with the value supplied for `name`
 *   {{ and }}     literal `{` and `}`
 *
 * Rendering is a single pass: text inside a substituted value is never
 * expanded again, so a context payload containing `{year}` stays verbatim.
 */

// ─── Types ───────────────────────────────────────────────────────────

export type PlaceholderValue = string | number | bigint | boolean;

export type TemplateValues = Readonly<
  Record<string, PlaceholderValue | null | undefined>
>;

/** What to do when a placeholder has no value at render time. */
export type MissingValuePolicy = "error" | "empty";

export const MISSING_VALUE_POLICIES = ["error", "empty"] as const satisfies readonly MissingValuePolicy[];

export interface RenderOptions {
  onMissing?: MissingValuePolicy;
}

export type TemplateErrorCode =
  | "MALFORMED_TEMPLATE"
  | "MISSING_VALUE"
  | "MISSING_PLACEHOLDER";

type Segment =
  | { kind: "text"; text: string }
  | { kind: "placeholder"; name: string };

// ─── Errors ──────────────────────────────────────────────────────────

export class TemplateError extends Error {
  constructor(
    public readonly code: TemplateErrorCode,
    message: string,
    public readonly template: string,
    public readonly placeholders: string[] = [],
  ) {
    super(message);
    this.name = "TemplateError";
  }
}

// ─── Parsing ─────────────────────────────────────────────────────────

const PLACEHOLDER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function parse(name: string, source: string): Segment[] {
  const segments: Segment[] = [];
  let text = "";
  let i = 0;

  const malformed = (detail: string) =>
    new TemplateError(
      "MALFORMED_TEMPLATE",
      `Template "${name}" is malformed: ${detail}`,
      name,
    );

  while (i < source.length) {
    const ch = source.charAt(i);

    if (ch === "{") {
      if (source.charAt(i + 1) === "{") {
        text += "{";
        i += 2;
        continue;
      }
      const close = source.indexOf("}", i + 1);
      if (close === -1) {
        throw malformed(`unclosed "{" at offset ${i}`);
      }
      const placeholder = source.slice(i + 1, close);
      if (!PLACEHOLDER_NAME.test(placeholder)) {
        throw malformed(`invalid placeholder "{${placeholder}}" at offset ${i}`);
      }
      if (text) segments.push({ kind: "text", text });
      text = "";
      segments.push({ kind: "placeholder", name: placeholder });
      i = close + 1;
      continue;
    }

    if (ch === "}") {
      if (source.charAt(i + 1) === "}") {
        text += "}";
        i += 2;
        continue;
      }
      throw malformed(`single "}" at offset ${i}`);
    }

    text += ch;
    i += 1;
  }

  if (text) segments.push({ kind: "text", text });
  return segments;
}

// ─── PromptTemplate ──────────────────────────────────────────────────

export class PromptTemplate {
  readonly placeholders: readonly string[];
  private readonly segments: readonly Segment[];

  constructor(
    readonly name: string,
    readonly source: string,
  ) {
    this.segments = parse(name, source);
    this.placeholders = [
      ...new Set(
        this.segments.flatMap((s) => (s.kind === "placeholder" ? [s.name] : [])),
      ),
    ];
  }

  has(placeholder: string): boolean {
    return this.placeholders.includes(placeholder);
  }

  /**
   * Substitute every placeholder. Missing values (absent, `undefined` or
   * `null`) raise a MISSING_VALUE error unless `onMissing` is "empty".
   */
  render(values: TemplateValues, options: RenderOptions = {}): string {
    const onMissing = options.onMissing ?? "error";
    const missing = this.placeholders.filter((p) => lookup(values, p) === undefined);

    if (missing.length > 0 && onMissing === "error") {
      throw new TemplateError(
        "MISSING_VALUE",
        `Template "${this.name}" is missing values for: ${missing.join(", ")}`,
        this.name,
        missing,
      );
    }

    let out = "";
    for (const segment of this.segments) {
      if (segment.kind === "text") {
        out += segment.text;
      } else {
        const value = lookup(values, segment.name);
        out += value === undefined ? "" : String(value);
      }
    }
    return out;
  }
}

function lookup(values: TemplateValues, name: string): PlaceholderValue | undefined {
  if (!Object.prototype.hasOwnProperty.call(values, name)) return undefined;
  return values[name] ?? undefined;
}

// ─── Helpers ─────────────────────────────────────────────────────────

export function renderTemplate(
  source: string,
  values: TemplateValues,
  options?: RenderOptions,
): string {
  return new PromptTemplate("inline", source).render(values, options);
}

/**
 * Check that a template declares every placeholder the caller is going to
 * fill. Used when the template text comes from outside the codebase.
 */
export function assertPlaceholders(
  template: PromptTemplate,
  required: readonly string[],
): void {
  const absent = required.filter((p) => !template.has(p));
  if (absent.length > 0) {
    throw new TemplateError(
      "MISSING_PLACEHOLDER",
      `Template "${template.name}" does not declare: ${absent.map((p) => `{${p}}`).join(", ")}`,
      template.name,
      absent,
    );
  }
}
