import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isDocument, isTag, type AnyNode, type Element as DomElement } from 'domhandler';
import { ParseError } from './errors.js';

export const SNIPPET_MAX = 80;

/**
 * Read-only view of one parsed element. Attribute lookups keep the difference
 * between an unset attribute (`undefined`) and an empty value (`''`).
 */
export class DocElement {
  readonly tagName: string;
  readonly attributes: ReadonlyMap<string, string>;
  readonly children: DocElement[] = [];
  readonly parent: DocElement | null;
  private text?: string;

  constructor(
    private readonly $: CheerioAPI,
    private readonly node: DomElement,
    parent: DocElement | null,
  ) {
    this.tagName = node.name.toLowerCase();
    this.attributes = new Map(
      Object.entries(node.attribs).map(([k, v]) => [k.toLowerCase(), v] as const),
    );
    this.parent = parent;
  }

  hasAttribute(name: string): boolean {
    return this.attributes.has(name.toLowerCase());
  }

  getAttribute(name: string): string | undefined {
    return this.attributes.get(name.toLowerCase());
  }

  get textContent(): string {
    if (this.text === undefined) this.text = this.$(this.node).text().trim();
    return this.text;
  }

  get outerHtml(): string {
    return this.$.html(this.node);
  }

  /** Nearest ancestor with the given tag; the element itself is not considered. */
  closest(tagName: string): DocElement | null {
    const tag = tagName.toLowerCase();
    let cur = this.parent;
    while (cur) {
      if (cur.tagName === tag) return cur;
      cur = cur.parent;
    }
    return null;
  }

  /** Descendants with the given tag, in document order. */
  find(tagName: string): DocElement[] {
    const tag = tagName.toLowerCase();
    const out: DocElement[] = [];
    const stack = [...this.children].reverse();
    while (stack.length) {
      const el = stack.pop();
      if (!el) break;
      if (el.tagName === tag) out.push(el);
      for (let i = el.children.length - 1; i >= 0; i--) stack.push(el.children[i]);
    }
    return out;
  }

  childrenByTag(tagName: string): DocElement[] {
    const tag = tagName.toLowerCase();
    return this.children.filter((c) => c.tagName === tag);
  }
}

/** Outer markup cut to `max` characters, with `...` appended when cut. */
export function snippet(el: DocElement, max = SNIPPET_MAX): string {
  const html = el.outerHtml.replace(/\s+/g, ' ').trim();
  return html.length > max ? html.slice(0, max) + '...' : html;
}

function decode(markup: unknown): string {
  if (typeof markup === 'string') return markup;
  if (markup instanceof Uint8Array) {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(markup);
    } catch (e) {
      throw new ParseError('markup is not valid UTF-8', { cause: e });
    }
  }
  throw new ParseError(`markup must be a string or bytes, got ${typeof markup}`);
}

/**
 * Element tree built once per analysis. Malformed markup is recovered the way
 * browsers do; only text that cannot be decoded is rejected. `<noscript>` and
 * `<template>` contents are parsed as elements, since a page may still ship them.
 */
export class DocumentModel {
  /** Every element, depth-first in source order. */
  readonly elements: readonly DocElement[];
  readonly roots: readonly DocElement[];

  private constructor(roots: DocElement[], elements: DocElement[]) {
    this.roots = roots;
    this.elements = elements;
  }

  static parse(markup: string | Uint8Array): DocumentModel {
    const text = decode(markup);
    let $: CheerioAPI;
    try {
      $ = cheerio.load(text, { scriptingEnabled: false });
    } catch (e) {
      throw new ParseError('markup could not be parsed', { cause: e });
    }
    const roots: DocElement[] = [];
    const elements: DocElement[] = [];
    const stack: { node: AnyNode; parent: DocElement | null }[] = $.root()
      .contents()
      .toArray()
      .reverse()
      .map((node) => ({ node, parent: null }));
    while (stack.length) {
      const item = stack.pop();
      if (!item) break;
      const { node, parent } = item;
      // <template> content hangs off a document fragment inside the element.
      if (isDocument(node)) {
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push({ node: node.children[i], parent });
        }
        continue;
      }
      if (!isTag(node)) continue;
      const el = new DocElement($, node, parent);
      elements.push(el);
      if (parent) parent.children.push(el);
      else roots.push(el);
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push({ node: node.children[i], parent: el });
      }
    }
    return new DocumentModel(roots, elements);
  }

  findAllByTag(names: string | readonly string[]): DocElement[] {
    const wanted = new Set((typeof names === 'string' ? [names] : names).map((n) => n.toLowerCase()));
    return this.elements.filter((el) => wanted.has(el.tagName));
  }

  findAllWithAttribute(name: string, tagName?: string): DocElement[] {
    const tag = tagName?.toLowerCase();
    return this.elements.filter((el) => el.hasAttribute(name) && (!tag || el.tagName === tag));
  }

  findById(id: string): DocElement | null {
    return this.elements.find((el) => el.getAttribute('id') === id) ?? null;
  }

  findNearestAncestor(el: DocElement, tagName: string): DocElement | null {
    return el.closest(tagName);
  }
}
