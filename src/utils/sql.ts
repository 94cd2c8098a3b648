/**
 * shadow-alter - Statement Inspection
 *
 * Decides whether a statement can safely be re-run after a reconnect.
 */

import type { Dialect } from "../types/session.js";

/**
 * Leading keywords of statements that never change data.
 * EXPLAIN is left out: EXPLAIN ANALYZE executes its statement.
 */
export const readOnlyKeywords: Record<Dialect, readonly string[]> = {
  mysql: ["select", "show", "describe", "desc"],
  postgres: ["select", "show", "values", "table"],
};

/**
 * Read statements that still write: SELECT ... INTO creates a table (or a file
 * on MySQL), and sequence functions advance the sequence on every call.
 */
const writingReadPattern = /\binto\b|\b(?:nextval|setval)\s*\(/;

/**
 * Remove single-line (--) and multi-line comments from a statement
 */
export function stripSqlComments(sql: string): string {
  const cleaned = sql
    .split("\n")
    .map((line) => {
      const commentIndex = line.indexOf("--");
      return commentIndex >= 0 ? line.substring(0, commentIndex) : line;
    })
    .join("\n");

  return cleaned.replace(/\/\*[\s\S]*?\*\//g, " ").trim();
}

/**
 * Check whether a statement is read-only based on its first keyword
 */
export function isReadOnlyStatement(sql: string, dialect: Dialect): boolean {
  const cleaned = stripSqlComments(sql).toLowerCase();
  if (!cleaned) {
    return false;
  }

  const firstWord = cleaned.replace(/^[(\s]+/, "").split(/[\s(;]+/)[0] ?? "";
  if (!readOnlyKeywords[dialect].includes(firstWord)) {
    return false;
  }
  return !writingReadPattern.test(cleaned);
}
