import { requireMessageCatalog, type MessageKey } from "../config/messaging.js";

export type TemplateVars = Record<string, string | number>;

export function interpolate(template: string, vars: TemplateVars): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    const value = vars[key];
    return value === undefined ? match : String(value);
  });
}

export function renderMessage(key: MessageKey, vars: TemplateVars = {}): string {
  const template = requireMessageCatalog()[key];
  if (template === undefined) throw new Error(`Unknown message key: ${key}`);
  return interpolate(template, vars);
}

export function joinBlocks(...blocks: Array<string | null | undefined>): string {
  return blocks.filter((block): block is string => Boolean(block)).join("\n\n");
}
