import { isJsonObject, type JsonObject, type JsonValue } from '@event-relay/shared';

// `{$.event.<field>}` as the whole string; `<field>` is one segment with no dots.
const PLACEHOLDER_PATTERN = /^\{\$\.event\.([^.{}]+)\}$/;

export interface TemplateContext {
  data: JsonObject;
}

/**
 * Resolves a single placeholder string against the event data. Unknown
 * fields and strings outside the placeholder grammar come back unchanged,
 * so a misconfigured template shows up verbatim in the outbound request.
 */
export function resolvePlaceholder(value: string, context: TemplateContext): JsonValue {
  const match = PLACEHOLDER_PATTERN.exec(value);
  if (!match) {
    return value;
  }

  const field = match[1];
  if (field === undefined || !Object.hasOwn(context.data, field)) {
    return value;
  }

  const resolved = context.data[field];
  return resolved === undefined ? value : resolved;
}

export function renderTemplate(template: JsonValue, context: TemplateContext): JsonValue {
  if (typeof template === 'string') {
    return resolvePlaceholder(template, context);
  }

  if (Array.isArray(template)) {
    return template.map((item) => renderTemplate(item, context));
  }

  if (isJsonObject(template)) {
    return Object.fromEntries(
      Object.entries(template).map(([key, item]) => [key, renderTemplate(item, context)]),
    );
  }

  return template;
}
