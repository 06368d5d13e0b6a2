import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import type {
  Diagnostic,
  DiagnosticSeverity,
  SourceSpan,
} from "@importkit/compiler";

const UNKNOWN_FILE = "<unknown>";

type Position = { index: number; line: number; column: number };

type SpanContext = {
  path: string;
  start: Position;
  end: Position;
  lineText?: string;
};

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const clampIndex = (value: number, max: number): number =>
  Math.min(Math.max(value, 0), max);

const positionAt = (source: string, index: number): Position => {
  const before = source.slice(0, index);
  const lineStart = before.lastIndexOf("\n") + 1;
  return {
    index,
    line: before.split("\n").length,
    column: index - lineStart,
  };
};

const resolveSpanPath = (file: string): string =>
  isAbsolute(file) ? file : resolve(file);

const resolveSpanContext = (span: SourceSpan): SpanContext | undefined => {
  if (span.file === UNKNOWN_FILE) return undefined;
  const path = resolveSpanPath(span.file);
  let source: string;

  try {
    source = readFileSync(path, "utf8");
  } catch {
    // No snippet for files that are gone or unreadable; the location still prints.
    return undefined;
  }

  const boundedStart = clampIndex(span.start, source.length);
  const boundedEnd = clampIndex(span.end, source.length);
  const start = positionAt(source, boundedStart);
  const end = positionAt(source, Math.max(boundedEnd, boundedStart));
  const lineText = source.split("\n")[start.line - 1];

  return { path, start, end, lineText };
};

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

const formatSnippet = ({
  diagnostic,
  span,
  color,
}: {
  diagnostic: Diagnostic;
  span: SpanContext;
  color: Colorizer;
}): string | undefined => {
  if (span.lineText === undefined) return undefined;

  const { lineText, start, end } = span;
  const lineEndIndex = start.index - start.column + lineText.length;
  const highlightEnd = Math.min(
    Math.max(end.index, start.index + 1),
    Math.max(lineEndIndex, start.index + 1)
  );
  const gutter = `${start.line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(start.column)}${color.pointer(
    diagnostic.severity,
    "^".repeat(highlightEnd - start.index)
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${color.muted(diagnostic.message)}`,
  ].join("\n");
};

const formatLocation = ({
  span,
  context,
}: {
  span: SourceSpan;
  context?: SpanContext;
}): string | undefined => {
  if (context) {
    return `${context.path}:${context.start.line}:${context.start.column + 1}`;
  }
  if (span.file === UNKNOWN_FILE) return undefined;
  return `${resolveSpanPath(span.file)}:${span.start}-${span.end}`;
};

const formatHeader = ({
  diagnostic,
  context,
  color,
}: {
  diagnostic: Diagnostic;
  context?: SpanContext;
  color: Colorizer;
}): string => {
  const location = formatLocation({ span: diagnostic.span, context });
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const label = `${color.severityLabel(diagnostic.severity)}${phase} ${color.accent(
    diagnostic.code
  )}: ${diagnostic.message}`;
  return location ? `${location} ${label}` : label;
};

export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean } = {}
): string => {
  const color = createColorizer(options.color ?? true);
  const context = resolveSpanContext(diagnostic.span);
  const snippet = context
    ? formatSnippet({ diagnostic, span: context, color })
    : undefined;
  const related = (diagnostic.related ?? []).map((note) =>
    formatHeader({
      diagnostic: note,
      context: resolveSpanContext(note.span),
      color,
    })
  );
  const hints = (diagnostic.hints ?? []).map(
    (hint) => `${color.muted("hint:")} ${hint.message}`
  );

  return [formatHeader({ diagnostic, context, color }), snippet, ...related, ...hints]
    .filter((line): line is string => line !== undefined)
    .join("\n");
};
