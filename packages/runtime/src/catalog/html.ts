/**
 * CSS selection over HTML text
 */

import { list, record, str, type DynamicValue } from "@capbridge/shared";
import { defineCapability, type Capability } from "../registry/capability.js";
import { selectAll, selectFirst, type HtmlElement } from "../services/html.js";

function elementValue(element: HtmlElement): DynamicValue {
  const attrs: Record<string, DynamicValue> = {};
  for (const [name, value] of Object.entries(element.attrs)) {
    attrs[name] = str(value);
  }
  return record({ text: str(element.text), html: str(element.html), attrs: record(attrs) });
}

export function htmlCapabilities(): Capability[] {
  const params = [
    { name: "html", shape: "string" },
    { name: "selector", shape: "string" },
  ] as const;

  return [
    defineCapability({
      name: "html_select",
      description: "First element matching a CSS selector",
      params,
      parse: (args) => ({ html: args.string(0), selector: args.string(1) }),
      run: (_ctx, { html, selector }) => elementValue(selectFirst(html, selector)),
    }),
    defineCapability({
      name: "html_select_list",
      description: "Every element matching a CSS selector",
      params,
      parse: (args) => ({ html: args.string(0), selector: args.string(1) }),
      run: (_ctx, { html, selector }) => list(selectAll(html, selector).map(elementValue)),
    }),
  ];
}
