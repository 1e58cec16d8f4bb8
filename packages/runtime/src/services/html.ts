/**
 * CSS selection over HTML documents, backed by cheerio
 */

import { load } from "cheerio";
import { ERROR_CODES, OperationalError, withContext } from "@capbridge/shared";

export interface HtmlElement {
  text: string;
  html: string;
  attrs: Record<string, string>;
}

/**
 * First element matching selector
 * @throws OperationalError when nothing matches or the selector is invalid
 */
export function selectFirst(html: string, selector: string): HtmlElement {
  const [first] = selectAll(html, selector);
  if (!first) {
    throw new OperationalError(ERROR_CODES.HTML, `css selector matched no element: ${selector}`);
  }
  return first;
}

/**
 * Every element matching selector, in document order
 */
export function selectAll(html: string, selector: string): HtmlElement[] {
  const $ = load(html);
  try {
    return $(selector)
      .toArray()
      .map((element) => ({
        text: $(element).text(),
        html: $.html(element),
        attrs: { ...($(element).attr() ?? {}) },
      }));
  } catch (error) {
    throw withContext(ERROR_CODES.HTML, "invalid css selector", error);
  }
}
