/**
 * Inline formatting for resume content. Every field of a resume accepts a
 * {@link TextLike}: either a raw string or one of the nodes below. Nothing is
 * HTML-escaped; a string is emitted exactly as given, so content may carry
 * its own markup.
 */

export type TextNode =
  | { readonly kind: 'plain'; readonly text: string }
  | { readonly kind: 'bold'; readonly content: TextLike }
  | { readonly kind: 'italic'; readonly content: TextLike }
  | { readonly kind: 'underline'; readonly content: TextLike }
  | { readonly kind: 'link'; readonly text: string; readonly url: string; readonly icon: boolean }
  | { readonly kind: 'list'; readonly items: readonly TextLike[] }
  | { readonly kind: 'concat'; readonly parts: readonly TextLike[] };

export type TextLike = string | TextNode;

export function plain(text: string): TextNode {
  return frozen({ kind: 'plain', text });
}

export function bold(content: TextLike): TextNode {
  return frozen({ kind: 'bold', content });
}

/** Rendered as a description paragraph (`.des`), which the stylesheet italicises. */
export function italic(content: TextLike): TextNode {
  return frozen({ kind: 'italic', content });
}

/** Rendered as a `.label` span, which the stylesheet underlines. */
export function underline(content: TextLike): TextNode {
  return frozen({ kind: 'underline', content });
}

export interface LinkOptions {
  /** Adds the `open-link` class, which draws an external-link icon after the text. */
  icon?: boolean;
}

export function link(text: string, url: string, options: LinkOptions = {}): TextNode {
  return frozen({ kind: 'link', text, url, icon: options.icon ?? false });
}

export function bulletedList(items: readonly TextLike[]): TextNode {
  return frozen({ kind: 'list', items: Object.freeze([...items]) });
}

export function concat(...parts: TextLike[]): TextNode {
  return frozen({ kind: 'concat', parts: Object.freeze([...parts]) });
}

export function toTextNode(value: TextLike): TextNode {
  return typeof value === 'string' ? plain(value) : value;
}

export function renderText(value: TextLike): string {
  const node = toTextNode(value);

  switch (node.kind) {
    case 'plain':
      return node.text;
    case 'bold':
      return `<strong>${renderText(node.content)}</strong>`;
    case 'italic':
      return `<p class="des">${renderText(node.content)}</p>`;
    case 'underline':
      return `<span class="label">${renderText(node.content)}</span>`;
    case 'link':
      return node.icon
        ? `<a target="_blank" class="open-link" href="${node.url}">${node.text}</a>`
        : `<a target="_blank" href="${node.url}">${node.text}</a>`;
    case 'list':
      return `<ul>\n${node.items.map((item) => `<li><p>${renderText(item)}</p></li>\n`).join('')}</ul>\n`;
    case 'concat':
      return node.parts.map(renderText).join('');
    default:
      return assertNever(node);
  }
}

/** True when the value would render to something; empty strings count as absent. */
export function isPresent(value: TextLike | undefined): value is TextLike {
  return value !== undefined && value !== '';
}

function frozen(node: TextNode): TextNode {
  return Object.freeze(node);
}

function assertNever(node: never): never {
  throw new Error(`Unhandled text node: ${JSON.stringify(node)}`);
}
