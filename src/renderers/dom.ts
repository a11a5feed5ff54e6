/**
 * DOM Renderer - Browser DOM Adapter
 *
 * A thin layer over the browser DOM APIs: each method is a direct DOM call.
 * Nothing here touches `document` at import time, so the module can be
 * loaded in non-browser environments that only use VirtualRenderer.
 *
 * Use this renderer for web targets (default).
 */

import { SafeHTML } from '../core/safe-html.js';
import type { HostElement, HostListener, HostNode, IRendererAdapter } from './types.js';
import { VNode } from './virtual.js';

export { SafeHTML };

function asNode(node: HostNode): Node {
  if (node instanceof VNode) {
    throw new TypeError('Spindle: DOMRenderer received a virtual node');
  }
  return node;
}

function asElement(element: HostElement): Element {
  if (element instanceof VNode) {
    throw new TypeError('Spindle: DOMRenderer received a virtual node');
  }
  return element;
}

/**
 * DOM Renderer Implementation
 */
export const DOMRenderer: IRendererAdapter = {
  isBrowser: true,

  createElement(tagName: string, namespace?: string | null): Element {
    return namespace
      ? document.createElementNS(namespace, tagName)
      : document.createElement(tagName);
  },

  createTextNode(text: string): Text {
    return document.createTextNode(text);
  },

  createComment(text: string): Comment {
    return document.createComment(text);
  },

  cloneElement(element: HostElement, deep: boolean): Element {
    const clone = asElement(element).cloneNode(deep);
    if (!(clone instanceof Element)) {
      throw new TypeError('Spindle: cloning an element did not produce an element');
    }
    return clone;
  },

  insertBefore(parent: HostNode, node: HostNode, ref: HostNode | null): void {
    asNode(parent).insertBefore(asNode(node), ref === null ? null : asNode(ref));
  },

  appendChild(parent: HostNode, child: HostNode): void {
    asNode(parent).appendChild(asNode(child));
  },

  removeChild(parent: HostNode, child: HostNode): void {
    asNode(parent).removeChild(asNode(child));
  },

  firstChild(node: HostNode): Node | null {
    return asNode(node).firstChild;
  },

  nextSibling(node: HostNode): Node | null {
    return asNode(node).nextSibling;
  },

  tagName(element: HostElement): string {
    return asElement(element).tagName;
  },

  getAttribute(element: HostElement, name: string): string | null {
    return asElement(element).getAttribute(name);
  },

  setAttribute(element: HostElement, name: string, value: string): void {
    asElement(element).setAttribute(name, value);
  },

  removeAttribute(element: HostElement, name: string): void {
    asElement(element).removeAttribute(name);
  },

  addClass(element: HostElement, className: string): void {
    asElement(element).classList.add(className);
  },

  removeClass(element: HostElement, className: string): void {
    asElement(element).classList.remove(className);
  },

  setText(node: HostNode, text: string): void {
    asNode(node).nodeValue = text;
  },

  clearContent(element: HostElement): void {
    asElement(element).textContent = '';
  },

  setInnerHTML(element: HostElement, html: SafeHTML): void {
    if (!SafeHTML.isSafeHTML(html)) {
      throw new TypeError(
        'Spindle: setInnerHTML() requires a SafeHTML instance.\n' +
        'Use SafeHTML.sanitize(html) to wrap untrusted content.'
      );
    }
    asElement(element).innerHTML = html.toString();
  },

  setValue(element: HostElement, value: string): boolean {
    const el = asElement(element);
    if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement || el instanceof HTMLSelectElement) {
      el.value = value;
      return true;
    }
    return false;
  },

  setChecked(element: HostElement, checked: boolean): boolean {
    const el = asElement(element);
    if (el instanceof HTMLInputElement) {
      el.checked = checked;
      return true;
    }
    return false;
  },

  isSelectElement(element: HostElement): boolean {
    return asElement(element) instanceof HTMLSelectElement;
  },

  focus(element: HostElement): void {
    const el = asElement(element);
    if (el instanceof HTMLElement || el instanceof SVGElement) {
      el.focus();
    }
  },

  addEventListener(node: HostNode, type: string, handler: HostListener): void {
    asNode(node).addEventListener(type, handler);
  },

  removeEventListener(node: HostNode, type: string, handler: HostListener): void {
    asNode(node).removeEventListener(type, handler);
  }
};
