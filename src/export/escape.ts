/**
 * Label escaping for the markup exporters.
 */

const XML_ENTITIES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/** Escape `& < > " '` for use in XML text and attribute values. */
export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

const MERMAID_ENTITIES: Readonly<Record<string, string>> = {
  '&': '#amp;',
  '<': '#lt;',
  '>': '#gt;',
  '"': '#quot;',
  "'": '#39;',
};

/**
 * Escape a Mermaid label for use inside double quotes.  Mermaid uses
 * `#name;` entity codes; line breaks become `<br/>`.
 */
export function escapeMermaid(text: string): string {
  return text
    .replace(/[&<>"']/g, (ch) => MERMAID_ENTITIES[ch] ?? ch)
    .replace(/\r?\n/g, '<br/>');
}

/** Collapse line breaks and tabs to single spaces for plain-text output. */
export function flattenLabel(text: string): string {
  return text.replace(/[\r\n\t]+/g, ' ');
}
