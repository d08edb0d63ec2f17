/**
 * Explanation templates: `{name}` placeholders filled from values matched
 * during evaluation. Names may contain dots (`connected.belongs_to`).
 * Placeholders without a binding are left as written.
 */

import type { Literal } from './types.js';

const PLACEHOLDER = /\{([A-Za-z_][\w.-]*)\}/g;

export type TemplateBindings = ReadonlyMap<string, Literal>;

export function renderTemplate(template: string, bindings: TemplateBindings): string {
  return template.replace(PLACEHOLDER, (match, name: string) => {
    const value = bindings.get(name);
    return value === undefined ? match : formatValue(value);
  });
}

/** Placeholder names used by a template, in order of first appearance */
export function placeholdersOf(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (!names.includes(match[1])) names.push(match[1]);
  }
  return names;
}

function formatValue(value: Literal): string {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    return String(Number(value.toFixed(4)));
  }
  return String(value);
}
