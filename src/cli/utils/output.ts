/**
 * CLI output utilities.
 * @module cli/utils/output
 */

import type { TodoResponse } from "../../client.js";

/**
 * Output formatting options.
 */
export interface OutputOptions {
  /** Suppress the status and content-type lines */
  quiet?: boolean;
  /** Force ANSI colour on or off (default: terminals, unless NO_COLOR) */
  color?: boolean;
}

const COLORS = {
  reset: "\x1b[0m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
};

function color(text: string, c: keyof typeof COLORS): string {
  return `${COLORS[c]}${text}${COLORS.reset}`;
}

function isColorTerminal(stream: NodeJS.WriteStream): boolean {
  return stream.isTTY === true && !process.env["NO_COLOR"];
}

/** Strings (with an optional trailing colon for keys), literals, numbers. */
const JSON_TOKEN =
  /("(?:\\.|[^"\\])*")(\s*:)?|\b(?:true|false|null)\b|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/g;

/**
 * Colour serialized JSON: keys blue, strings green, numbers yellow,
 * booleans and null magenta.
 */
export function colorizeJson(json: string): string {
  return json.replace(
    JSON_TOKEN,
    (token: string, str: string | undefined, colon: string | undefined) => {
      if (str !== undefined) {
        return colon !== undefined
          ? `${color(str, "blue")}${colon}`
          : color(str, "green");
      }
      return /^[tfn]/.test(token)
        ? color(token, "magenta")
        : color(token, "yellow");
    },
  );
}

/**
 * Format a response body for stdout: indented JSON when the body was
 * JSON, the raw text otherwise.
 */
export function formatBody(response: TodoResponse): string {
  if (response.json !== undefined) {
    return JSON.stringify(response.json, null, 2);
  }
  return response.text;
}

/**
 * Format the status line, e.g. `Status: 404 Not Found`.
 */
export function formatStatus(response: TodoResponse): string {
  const reason = response.statusText ? ` ${response.statusText}` : "";
  return `Status: ${response.status}${reason}`;
}

/**
 * Print a response: metadata to stderr, body to stdout, so the body
 * can be piped. Each stream is coloured only when it is a terminal.
 */
export function renderResponse(
  response: TodoResponse,
  options: OutputOptions = {},
): void {
  if (!options.quiet) {
    const status = formatStatus(response);
    console.error(
      (options.color ?? isColorTerminal(process.stderr))
        ? color(status, "green")
        : status,
    );
    if (response.contentType !== undefined) {
      console.error(`Content-Type: ${response.contentType}`);
    }
  }
  const body = formatBody(response);
  const colorBody =
    response.json !== undefined &&
    (options.color ?? isColorTerminal(process.stdout));
  console.log(colorBody ? colorizeJson(body) : body);
}
