/**
 * Spindle Renderer Types
 *
 * Defines the interface for pluggable rendering engines.
 * The engine never touches host objects directly; every creation, insertion
 * and mutation goes through an IRendererAdapter so the same component code
 * runs against:
 * - Web (Direct DOM via DOMRenderer)
 * - Tests and non-web targets (in-memory nodes via VirtualRenderer)
 */

import type { SafeHTML } from '../core/safe-html.js';
import type { VNode, VirtualEvent } from './virtual.js';

/** Any node the engine can hold: a browser DOM node or a virtual node. */
export type HostNode = Node | VNode;

/** An element-typed host node. */
export type HostElement = Element | VNode;

export type HostEvent = Event | VirtualEvent;

export type HostListener = (event: HostEvent) => void;

/**
 * Renderer Adapter Interface
 *
 * Implementations only receive nodes they created themselves. Passing a
 * virtual node to the DOM renderer (or the reverse) throws TypeError.
 */
export interface IRendererAdapter {
  /** True when backed by a real browser document */
  readonly isBrowser: boolean;

  /**
   * Create an element node
   * @param namespace - Namespace URI; null/undefined creates an HTML element
   */
  createElement(tagName: string, namespace?: string | null): HostElement;

  createTextNode(text: string): HostNode;

  /** Create a comment node (used for grouped fragment end markers) */
  createComment(text: string): HostNode;

  /**
   * Clone an element. A shallow clone copies attributes and form state
   * but no children and no listeners.
   */
  cloneElement(element: HostElement, deep: boolean): HostElement;

  /**
   * Insert a node before a reference node (append when ref is null).
   * Moving an already attached node is allowed.
   */
  insertBefore(parent: HostNode, node: HostNode, ref: HostNode | null): void;

  appendChild(parent: HostNode, child: HostNode): void;

  removeChild(parent: HostNode, child: HostNode): void;

  firstChild(node: HostNode): HostNode | null;

  nextSibling(node: HostNode): HostNode | null;

  /** Upper-case tag name of an element */
  tagName(element: HostElement): string;

  getAttribute(element: HostElement, name: string): string | null;

  setAttribute(element: HostElement, name: string, value: string): void;

  removeAttribute(element: HostElement, name: string): void;

  addClass(element: HostElement, className: string): void;

  removeClass(element: HostElement, className: string): void;

  /** Replace the value of a text node */
  setText(node: HostNode, text: string): void;

  /** Remove every child of an element */
  clearContent(element: HostElement): void;

  /**
   * Set inner HTML content.
   * @throws TypeError if html is not a SafeHTML instance
   */
  setInnerHTML(element: HostElement, html: SafeHTML): void;

  /**
   * Set the live `value` of an input, textarea or select.
   * @returns false when the element has no value to set
   */
  setValue(element: HostElement, value: string): boolean;

  /**
   * Set the live `checked` state of an input.
   * @returns false when the element is not an input
   */
  setChecked(element: HostElement, checked: boolean): boolean;

  isSelectElement(element: HostElement): boolean;

  focus(element: HostElement): void;

  addEventListener(node: HostNode, type: string, handler: HostListener): void;

  removeEventListener(node: HostNode, type: string, handler: HostListener): void;
}
