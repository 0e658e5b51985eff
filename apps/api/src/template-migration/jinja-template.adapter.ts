/**
 * Jinja → Scriban delimiter rewriting for notification templates.
 *
 * Only statement blocks (`{% %}`) and comments (`{# #}`) differ between the
 * two dialects at the delimiter level; `{{ expr }}` is shared and is left
 * alone. Text outside delimiters is copied unchanged.
 */

const LEGACY_MARKERS = ['{%', '%}', '{#', '#}'] as const;

const STATEMENT_BLOCK = /\{%(-?)([\s\S]*?)(-?)%\}/g;
const RAW_BLOCK = /\{%(-?)\s*raw\s*(-?)%\}([\s\S]*?)\{%(-?)\s*endraw\s*(-?)%\}/g;
const COMMENT_BLOCK = /\{#(-?)([\s\S]*?)(-?)#\}/g;

/**
 * True when `template` holds at least one Jinja statement or comment
 * delimiter. Literal text that happens to contain a delimiter counts too.
 */
export function isJinjaTemplate(template: string): boolean {
  return LEGACY_MARKERS.some((marker) => template.includes(marker));
}

/**
 * Rewrites Jinja statement and comment blocks into Scriban code blocks.
 *
 * - `{% endif %}`, `{% endfor %}` and other `end…` tags become `{{ end }}`
 * - `{% elif x %}` becomes `{{ else if x }}`
 * - `{% set x = y %}` becomes `{{ x = y }}`
 * - `{# note #}` becomes `{{ # note }}`; a comment spanning lines becomes
 *   `{{ ## … ## }}`
 * - `{% raw %}…{% endraw %}` becomes a string literal printing the text
 * - whitespace-control dashes carry over (`{%- x -%}` → `{{- x -}}`)
 *
 * The result never contains a Jinja delimiter, so adapting it again is a
 * no-op.
 */
export function adaptForScriban(template: string): string {
  if (!isJinjaTemplate(template)) {
    return template;
  }

  const raw = new RegExp(RAW_BLOCK.source, 'g');
  let result = '';
  let offset = 0;
  let match: RegExpExecArray | null;
  while ((match = raw.exec(template)) !== null) {
    result += convertSegment(template.slice(offset, match.index));
    result += literalBlock(match[1], match[3], match[5]);
    offset = match.index + match[0].length;
  }

  return result + convertSegment(template.slice(offset));
}

function convertSegment(segment: string): string {
  if (!isJinjaTemplate(segment)) {
    return segment;
  }

  const converted = segment
    .replace(STATEMENT_BLOCK, (_match, open: string, body: string, close: string) =>
      codeBlock(open, rewriteStatement(body.trim()), close),
    )
    .replace(COMMENT_BLOCK, (_match, open: string, body: string, close: string) =>
      codeBlock(open, commentStatement(body.trim()), close),
    );

  return replaceStrayMarkers(converted);
}

function codeBlock(open: string, statement: string, close: string): string {
  const inner = statement.length > 0 ? ` ${statement} ` : ' ';
  return `{{${open}${inner}${close}}}`;
}

function commentStatement(text: string): string {
  if (text.includes('\n')) {
    // `#` only runs to the end of the line
    return `## ${text} ##`;
  }
  return text.length > 0 ? `# ${text}` : '#';
}

/**
 * Verbatim text as a double-quoted Scriban string. The `%` or `#` of a
 * delimiter inside it is written as a unicode escape.
 */
function literalBlock(open: string, text: string, close: string): string {
  const escaped = text
    .replace(/[\\"]/g, '\\$&')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
    .replace(/(?<=\{)%|%(?=\})/g, '\\u0025')
    .replace(/(?<=\{)#|#(?=\})/g, '\\u0023');
  return codeBlock(open, `"${escaped}"`, close);
}

function rewriteStatement(statement: string): string {
  const keyword = /^([a-z_]+)\b\s*([\s\S]*)$/i.exec(statement);
  if (!keyword) {
    return statement;
  }

  const [, name, rest] = keyword;
  const lower = name.toLowerCase();

  if (lower.startsWith('end') && rest.length === 0) {
    return 'end';
  }

  if (lower === 'elif') {
    return rest.length > 0 ? `else if ${rest}` : 'else if';
  }

  if (lower === 'set' && rest.length > 0) {
    return rest;
  }

  return statement;
}

/**
 * Unbalanced delimiters (an opening `{%` without a closing `%}` and so on)
 * are swapped for the Scriban delimiter on the same side. A swap can expose
 * a new pair such as `%#}` → `%}}`, so passes repeat until none is left.
 */
function replaceStrayMarkers(template: string): string {
  let result = template;
  while (isJinjaTemplate(result)) {
    result = result
      .replace(/\{%/g, '{{')
      .replace(/%\}/g, '}}')
      .replace(/\{#/g, '{{ #')
      .replace(/#\}/g, '}}');
  }
  return result;
}
