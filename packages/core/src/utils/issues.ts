import type { ZodError } from "zod";
import type { DecodeIssue } from "sdui-shared";

/**
 * Render a zod path as `component.children[1].type`.
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out;
}

export function toDecodeIssues(error: ZodError): DecodeIssue[] {
  return error.issues.map((issue) => ({
    path: formatIssuePath(issue.path),
    message: issue.message,
  }));
}
