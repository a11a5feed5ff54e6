/**
 * Virtual Renderer - In-Memory Node Adapter
 *
 * Implements IRendererAdapter over a tree of plain objects. Used for
 * non-web targets and, above all, for tests: every mutating call is recorded
 * in a journal so a test can assert exactly which writes a render pass made.
 *
 * @example
 * const renderer = new VirtualRenderer();
 * const root = renderer.createElement('div');
 * new Application(counter, { renderer }).mount(root);
 * renderer.takeLog(); // ['create #text "0"', 'insert #text', ...]
 */

import { SafeHTML } from '../core/safe-html.js';
import type { HostElement, HostListener, HostNode, IRendererAdapter } from './types.js';

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;
export const COMMENT_NODE = 8;

export type VirtualNodeType = typeof ELEMENT_NODE | typeof TEXT_NODE | typeof COMMENT_NODE;

const VOID_ELEMENTS = new Set([
  'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input',
  'link', 'meta', 'source', 'track', 'wbr'
]);

/**
 * Synthetic event delivered by VirtualRenderer.dispatchEvent().
 */
export interface VirtualEvent {
  readonly type: string;
  readonly target: VNode;
  currentTarget: VNode;
  readonly detail: unknown;
  defaultPrevented: boolean;
  preventDefault(): void;
  stopPropagation(): void;
}

/**
 * Virtual Node. A minimal DOM-like node: elements carry attributes,
 * children, listeners and form state; text and comment nodes a value.
 */
export class VNode {
  readonly attributes = new Map<string, string>();
  childNodes: VNode[] = [];
  parentNode: VNode | null = null;
  readonly listeners = new Map<string, HostListener[]>();
  /** Live form value (input, textarea, select) */
  value = '';
  /** Live checked state (input) */
  checked = false;
  /** Raw markup set through setInnerHTML */
  innerHTML: string | null = null;

  constructor(
    readonly nodeType: VirtualNodeType,
    /** Upper-case tag name; empty for text and comment nodes */
    readonly tagName: string,
    readonly namespace: string | null,
    public nodeValue: string | null
  ) {}

  get firstChild(): VNode | null {
    return this.childNodes[0] ?? null;
  }

  get nextSibling(): VNode | null {
    if (!this.parentNode) return null;
    const siblings = this.parentNode.childNodes;
    return siblings[siblings.indexOf(this) + 1] ?? null;
  }

  get textContent(): string {
    if (this.nodeType === TEXT_NODE) return this.nodeValue ?? '';
    if (this.nodeType === COMMENT_NODE) return '';
    return this.childNodes.map(child => child.textContent).join('');
  }
}

function describe(node: VNode): string {
  if (node.nodeType === TEXT_NODE) return '#text';
  if (node.nodeType === COMMENT_NODE) return '#comment';
  return node.tagName;
}

function escapeHTML(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function serializeVNode(node: VNode, comments: boolean): string {
  if (node.nodeType === TEXT_NODE) {
    return escapeHTML(node.nodeValue ?? '');
  }

  if (node.nodeType === COMMENT_NODE) {
    return comments ? `<!--${node.nodeValue ?? ''}-->` : '';
  }

  const tag = node.tagName.toLowerCase();
  let attrs = '';
  for (const [key, value] of node.attributes) {
    attrs += ` ${key}="${escapeHTML(value)}"`;
  }

  if (VOID_ELEMENTS.has(tag)) {
    return `<${tag}${attrs} />`;
  }

  const inner = node.innerHTML !== null && node.childNodes.length === 0
    ? node.innerHTML
    : node.childNodes.map(child => serializeVNode(child, comments)).join('');
  return `<${tag}${attrs}>${inner}</${tag}>`;
}

function cloneVNode(node: VNode, deep: boolean): VNode {
  const clone = new VNode(node.nodeType, node.tagName, node.namespace, node.nodeValue);
  for (const [key, value] of node.attributes) {
    clone.attributes.set(key, value);
  }
  clone.value = node.value;
  clone.checked = node.checked;
  if (deep) {
    clone.innerHTML = node.innerHTML;
    for (const child of node.childNodes) {
      const childClone = cloneVNode(child, true);
      childClone.parentNode = clone;
      clone.childNodes.push(childClone);
    }
  }
  return clone;
}

function detach(node: VNode): void {
  const parent = node.parentNode;
  if (!parent) return;
  const index = parent.childNodes.indexOf(node);
  if (index !== -1) parent.childNodes.splice(index, 1);
  node.parentNode = null;
}

function optionValue(option: VNode): string {
  return option.attributes.get('value') ?? option.textContent;
}

function findOption(node: VNode, value: string): VNode | null {
  for (const child of node.childNodes) {
    if (child.tagName === 'OPTION' && optionValue(child) === value) return child;
    const nested = findOption(child, value);
    if (nested) return nested;
  }
  return null;
}

function asVNode(node: HostNode): VNode {
  if (!(node instanceof VNode)) {
    throw new TypeError('Spindle: VirtualRenderer received a node it did not create');
  }
  return node;
}

/**
 * Virtual Renderer Implementation
 */
export class VirtualRenderer implements IRendererAdapter {
  readonly isBrowser = false;

  /** Root container for the virtual tree */
  private root: VNode;

  /** Journal of mutating calls, oldest first */
  private readonly journal: string[] = [];

  /** Debug mode flag */
  private readonly debug: boolean;

  constructor(options: { debug?: boolean } = {}) {
    this.debug = options.debug ?? false;
    this.root = new VNode(ELEMENT_NODE, 'BODY', null, null);
  }

  private record(entry: string): void {
    this.journal.push(entry);
    if (this.debug) {
      console.log('[VirtualRenderer]', entry);
    }
  }

  createElement(tagName: string, namespace: string | null = null): VNode {
    const tag = namespace ? tagName : tagName.toUpperCase();
    this.record(`create ${tag}`);
    return new VNode(ELEMENT_NODE, tag, namespace, null);
  }

  createTextNode(text: string): VNode {
    this.record(`create #text "${text}"`);
    return new VNode(TEXT_NODE, '', null, text);
  }

  createComment(text: string): VNode {
    this.record('create #comment');
    return new VNode(COMMENT_NODE, '', null, text);
  }

  cloneElement(element: HostElement, deep: boolean): VNode {
    const source = asVNode(element);
    this.record(`clone ${describe(source)}`);
    return cloneVNode(source, deep);
  }

  insertBefore(parent: HostNode, node: HostNode, ref: HostNode | null): void {
    const p = asVNode(parent);
    const child = asVNode(node);
    const anchor = ref === null ? null : asVNode(ref);
    if (anchor !== null && anchor.parentNode !== p) {
      throw new Error('Spindle: insertBefore reference node is not a child of the parent');
    }
    detach(child);
    const index = anchor === null ? p.childNodes.length : p.childNodes.indexOf(anchor);
    p.childNodes.splice(index, 0, child);
    child.parentNode = p;
    this.record(`insert ${describe(child)}`);
  }

  appendChild(parent: HostNode, child: HostNode): void {
    this.insertBefore(parent, child, null);
  }

  removeChild(parent: HostNode, child: HostNode): void {
    const p = asVNode(parent);
    const c = asVNode(child);
    if (c.parentNode !== p) {
      throw new Error('Spindle: removeChild target is not a child of the parent');
    }
    detach(c);
    this.record(`remove ${describe(c)}`);
  }

  firstChild(node: HostNode): VNode | null {
    return asVNode(node).firstChild;
  }

  nextSibling(node: HostNode): VNode | null {
    return asVNode(node).nextSibling;
  }

  tagName(element: HostElement): string {
    return asVNode(element).tagName;
  }

  getAttribute(element: HostElement, name: string): string | null {
    return asVNode(element).attributes.get(name) ?? null;
  }

  setAttribute(element: HostElement, name: string, value: string): void {
    const node = asVNode(element);
    node.attributes.set(name, value);
    this.record(`setAttribute ${describe(node)} ${name}="${value}"`);
  }

  removeAttribute(element: HostElement, name: string): void {
    const node = asVNode(element);
    node.attributes.delete(name);
    this.record(`removeAttribute ${describe(node)} ${name}`);
  }

  addClass(element: HostElement, className: string): void {
    const node = asVNode(element);
    const classes = (node.attributes.get('class') ?? '').split(' ').filter(Boolean);
    if (!classes.includes(className)) classes.push(className);
    node.attributes.set('class', classes.join(' '));
    this.record(`addClass ${describe(node)} ${className}`);
  }

  removeClass(element: HostElement, className: string): void {
    const node = asVNode(element);
    const current = node.attributes.get('class');
    if (current !== undefined) {
      const classes = current.split(' ').filter(c => c && c !== className);
      node.attributes.set('class', classes.join(' '));
    }
    this.record(`removeClass ${describe(node)} ${className}`);
  }

  setText(node: HostNode, text: string): void {
    asVNode(node).nodeValue = text;
    this.record(`setText "${text}"`);
  }

  clearContent(element: HostElement): void {
    const node = asVNode(element);
    for (const child of node.childNodes) {
      child.parentNode = null;
    }
    node.childNodes = [];
    node.innerHTML = null;
    this.record(`clearContent ${describe(node)}`);
  }

  setInnerHTML(element: HostElement, html: SafeHTML): void {
    if (!SafeHTML.isSafeHTML(html)) {
      throw new TypeError(
        'Spindle: setInnerHTML() requires a SafeHTML instance.\n' +
        'Use SafeHTML.sanitize(html) to wrap untrusted content.'
      );
    }
    const node = asVNode(element);
    for (const child of node.childNodes) {
      child.parentNode = null;
    }
    node.childNodes = [];
    node.innerHTML = html.toString();
    this.record(`setInnerHTML ${describe(node)}`);
  }

  setValue(element: HostElement, value: string): boolean {
    const node = asVNode(element);
    switch (node.tagName) {
      case 'INPUT':
      case 'TEXTAREA':
        node.value = value;
        break;
      case 'SELECT':
        // Like the browser: a value with no matching option clears the selection.
        node.value = findOption(node, value) ? value : '';
        break;
      default:
        return false;
    }
    this.record(`setValue ${describe(node)} "${value}"`);
    return true;
  }

  setChecked(element: HostElement, checked: boolean): boolean {
    const node = asVNode(element);
    if (node.tagName !== 'INPUT') return false;
    node.checked = checked;
    this.record(`setChecked ${describe(node)} ${checked}`);
    return true;
  }

  isSelectElement(element: HostElement): boolean {
    return asVNode(element).tagName === 'SELECT';
  }

  focus(element: HostElement): void {
    this.record(`focus ${describe(asVNode(element))}`);
  }

  addEventListener(node: HostNode, type: string, handler: HostListener): void {
    const target = asVNode(node);
    let handlers = target.listeners.get(type);
    if (!handlers) {
      handlers = [];
      target.listeners.set(type, handlers);
    }
    handlers.push(handler);
    this.record(`listen ${describe(target)} ${type}`);
  }

  removeEventListener(node: HostNode, type: string, handler: HostListener): void {
    const target = asVNode(node);
    const handlers = target.listeners.get(type);
    if (!handlers) return;
    const index = handlers.indexOf(handler);
    if (index !== -1) {
      handlers.splice(index, 1);
      this.record(`unlisten ${describe(target)} ${type}`);
    }
  }

  /**
   * Dispatch a synthetic event that bubbles up the parent chain.
   * Not recorded in the journal.
   */
  dispatchEvent(node: VNode, type: string, detail?: unknown): VirtualEvent {
    let propagationStopped = false;
    const event: VirtualEvent = {
      type,
      target: node,
      currentTarget: node,
      detail,
      defaultPrevented: false,
      preventDefault() { event.defaultPrevented = true; },
      stopPropagation() { propagationStopped = true; }
    };

    let current: VNode | null = node;
    while (current && !propagationStopped) {
      const handlers = current.listeners.get(type);
      if (handlers) {
        event.currentTarget = current;
        for (const handler of [...handlers]) {
          if (propagationStopped) break;
          handler(event);
        }
      }
      current = current.parentNode;
    }
    return event;
  }

  /** Number of handlers currently bound for an event type on a node */
  listenerCount(node: VNode, type: string): number {
    return node.listeners.get(type)?.length ?? 0;
  }

  /**
   * Serialize a virtual node to an HTML string.
   * End markers of grouped fragments are comments; pass `comments: false` to omit them.
   */
  serialize(node?: VNode, options: { comments?: boolean } = {}): string {
    return serializeVNode(node ?? this.root, options.comments ?? true);
  }

  getRoot(): VNode {
    return this.root;
  }

  /** Journal entries recorded so far */
  get log(): readonly string[] {
    return this.journal;
  }

  /** Return the journal and start a new one */
  takeLog(): string[] {
    return this.journal.splice(0, this.journal.length);
  }

  /**
   * Reset the virtual tree and journal.
   */
  reset(): void {
    this.root = new VNode(ELEMENT_NODE, 'BODY', null, null);
    this.journal.length = 0;
  }
}

export function createVirtualRenderer(options?: { debug?: boolean }): VirtualRenderer {
  return new VirtualRenderer(options);
}
