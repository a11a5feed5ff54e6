/**
 * Node Store
 *
 * The retained tree. Each Element owns its attribute cache and an ordered list
 * of child slots. A slot is addressed only by its position in the render pass:
 *
 *   index === count  -> create the node and insert it before the anchor
 *   index  <  count  -> reuse it; the slot kind (and tag) must match
 *   index  >  count  -> a slot was skipped: ContractViolationError
 *
 * Slots left over after a pass are removed from the host and disposed.
 */

import type { HostElement, HostNode, IRendererAdapter } from '../renderers/types.js';
import { AttributeList } from './attributes.js';
import { contractViolation } from './errors.js';
import type { KeyedList } from './keyed-list.js';
import { ElementStatus, GROUP_END_MARKER, type ListElementCreation } from './symbols.js';

/**
 * Type-erased handle to a component mounted into an element.
 * Releasing it unmounts the component.
 */
export interface ComponentHandle {
  /** The component owner the handle was created from */
  readonly owner: object;
  release(): void;
}

export class Element {
  /** Child slots. Empty while the element's children are a keyed list. */
  readonly nodes: Nodes;
  /** Present once a keyed list has been rendered into this element */
  keyedList: KeyedList | null = null;
  /** Content was set through html(); children are not managed */
  hasRawHtml = false;

  constructor(
    readonly renderer: IRendererAdapter,
    readonly host: HostElement,
    /** Tag the element was created with, as written by the render function */
    readonly tag: string,
    readonly namespace: string | null,
    readonly attributes: AttributeList = new AttributeList()
  ) {
    this.nodes = new Nodes(renderer);
  }

  static create(renderer: IRendererAdapter, tag: string, namespace: string | null): Element {
    return new Element(renderer, renderer.createElement(tag, namespace), tag, namespace);
  }

  /** Wrap an element that already exists in the host tree */
  static fromHost(renderer: IRendererAdapter, host: HostElement, namespace: string | null = null): Element {
    return new Element(renderer, host, renderer.tagName(host).toLowerCase(), namespace);
  }

  /**
   * Duplicate this element for a new list item. The copy carries the cached
   * attribute values (the host clone carries the same values) but no
   * listeners; grouped fragments come back empty.
   */
  clone(): Element {
    if (this.keyedList) {
      contractViolation(
        `<${this.tag}> owns a keyed list and cannot be cloned; render this list with mode 'new'`
      );
    }
    const host = this.renderer.cloneElement(this.host, this.hasRawHtml);
    const clone = new Element(this.renderer, host, this.tag, this.namespace, this.attributes.cloneWithoutListeners());
    clone.hasRawHtml = this.hasRawHtml;
    clone.nodes.appendClonesOf(this.nodes, host);
    return clone;
  }

  /** Detach listeners and release mounted components in this subtree */
  dispose(): void {
    this.attributes.removeListeners();
    this.nodes.dispose();
    this.keyedList?.dispose();
  }
}

export class TextNode {
  constructor(readonly host: HostNode, public text: string) {}

  update(renderer: IRendererAdapter, text: string): void {
    if (this.text !== text) {
      this.text = text;
      renderer.setText(this.host, text);
    }
  }
}

/**
 * A run of sibling nodes followed by an invisible end marker. Used for
 * match-if arms and non-keyed lists: children are inserted before the marker,
 * so the fragment can grow or shrink without disturbing nodes after it.
 */
export class GroupedNodes {
  /** Arm rendered last; null when nothing is rendered */
  activeIndex: number | null = null;
  readonly endMarker: HostNode;
  readonly nodes: Nodes;

  constructor(private readonly renderer: IRendererAdapter) {
    this.endMarker = renderer.createComment(GROUP_END_MARKER);
    this.nodes = new Nodes(renderer);
  }

  /**
   * Select the arm to render. Re-selecting the active arm keeps its nodes
   * (Existing); a different arm starts from an empty fragment (JustCreated).
   */
  selectArm(index: number, parent: HostNode): ElementStatus {
    if (this.activeIndex === index) {
      return ElementStatus.Existing;
    }
    this.nodes.clear(parent);
    this.activeIndex = index;
    return ElementStatus.JustCreated;
  }

  /** Remove the fragment content but keep the marker */
  deselect(parent: HostNode): void {
    this.nodes.clear(parent);
    this.activeIndex = null;
  }

  /** Remove the content and the marker */
  clear(parent: HostNode): void {
    this.nodes.clear(parent);
    this.renderer.removeChild(parent, this.endMarker);
  }

  dispose(): void {
    this.nodes.dispose();
  }
}

export class ComponentSlot {
  constructor(readonly handle: ComponentHandle) {}
}

export type NodeSlot = Element | TextNode | GroupedNodes | ComponentSlot;

function slotName(slot: NodeSlot): string {
  if (slot instanceof Element) return `<${slot.tag}> element`;
  if (slot instanceof TextNode) return 'text node';
  if (slot instanceof GroupedNodes) return 'grouped fragment';
  return 'mounted component';
}

export class Nodes {
  private readonly slots: NodeSlot[] = [];

  constructor(private readonly renderer: IRendererAdapter) {}

  get count(): number {
    return this.slots.length;
  }

  at(index: number): NodeSlot | undefined {
    return this.slots[index];
  }

  private assertPosition(index: number): void {
    if (index > this.slots.length) {
      contractViolation(`node position ${index} skipped; only ${this.slots.length} nodes recorded`);
    }
  }

  private mismatch(index: number, slot: NodeSlot, expected: string): never {
    return contractViolation(
      `node position ${index} holds a ${slotName(slot)} and now receives a ${expected}; ` +
      'render functions must emit children in the same order on every pass'
    );
  }

  /**
   * Element at `index`, created when the position is new.
   * @returns JustCreated for a new element, otherwise the parent's status
   */
  checkOrCreateElement(
    tag: string,
    namespace: string | null,
    index: number,
    parentStatus: ElementStatus,
    parent: HostNode,
    nextSibling: HostNode | null
  ): ElementStatus {
    this.assertPosition(index);
    if (index === this.slots.length) {
      const element = Element.create(this.renderer, tag, namespace);
      this.renderer.insertBefore(parent, element.host, nextSibling);
      this.slots.push(element);
      return ElementStatus.JustCreated;
    }
    this.elementAt(index, tag);
    return parentStatus;
  }

  /**
   * Element for list item `index`. In clone mode a new item is a copy of the
   * first item (JustCloned); otherwise it is built from scratch.
   */
  checkOrCreateElementForList(
    tag: string,
    namespace: string | null,
    index: number,
    parent: HostNode,
    nextSibling: HostNode | null,
    mode: ListElementCreation
  ): ElementStatus {
    this.assertPosition(index);
    if (index === this.slots.length) {
      const first = this.slots[0];
      let element: Element;
      let status: ElementStatus;
      if (mode === 'clone' && first instanceof Element) {
        element = first.clone();
        status = ElementStatus.JustCloned;
      } else {
        element = Element.create(this.renderer, tag, namespace);
        status = ElementStatus.JustCreated;
      }
      this.renderer.insertBefore(parent, element.host, nextSibling);
      this.slots.push(element);
      return status;
    }
    this.elementAt(index, tag);
    return ElementStatus.Existing;
  }

  elementAt(index: number, tag?: string): Element {
    const slot = this.slots[index];
    if (slot === undefined) {
      return contractViolation(`no node at position ${index}`);
    }
    if (!(slot instanceof Element)) {
      return this.mismatch(index, slot, tag ? `<${tag}> element` : 'element');
    }
    if (tag !== undefined && slot.tag !== tag) {
      return this.mismatch(index, slot, `<${tag}> element`);
    }
    return slot;
  }

  /** Text at `index`, rewritten only when it changed */
  updateText(index: number, text: string, parent: HostNode, nextSibling: HostNode | null): void {
    this.assertPosition(index);
    if (index === this.slots.length) {
      this.createText(text, parent, nextSibling);
      return;
    }
    const slot = this.slots[index];
    if (!(slot instanceof TextNode)) {
      return this.mismatch(index, slot, 'text node');
    }
    slot.update(this.renderer, text);
  }

  /** Text at `index`, written when created and never compared again */
  staticText(index: number, text: string, parent: HostNode, nextSibling: HostNode | null): void {
    this.assertPosition(index);
    if (index === this.slots.length) {
      this.createText(text, parent, nextSibling);
      return;
    }
    const slot = this.slots[index];
    if (!(slot instanceof TextNode)) {
      this.mismatch(index, slot, 'text node');
    }
  }

  private createText(text: string, parent: HostNode, nextSibling: HostNode | null): void {
    const host = this.renderer.createTextNode(text);
    this.renderer.insertBefore(parent, host, nextSibling);
    this.slots.push(new TextNode(host, text));
  }

  /** Grouped fragment at `index`; a new one places its end marker now */
  groupedNodes(index: number, parent: HostNode, nextSibling: HostNode | null): GroupedNodes {
    this.assertPosition(index);
    if (index === this.slots.length) {
      const group = new GroupedNodes(this.renderer);
      this.renderer.insertBefore(parent, group.endMarker, nextSibling);
      this.slots.push(group);
      return group;
    }
    const slot = this.slots[index];
    if (!(slot instanceof GroupedNodes)) {
      return this.mismatch(index, slot, 'grouped fragment');
    }
    return slot;
  }

  /** Handle of the component mounted into the owning element, if any */
  componentHandle(): ComponentHandle | null {
    const first = this.slots[0];
    return first instanceof ComponentSlot ? first.handle : null;
  }

  storeComponentHandle(handle: ComponentHandle): void {
    if (this.slots.length !== 0) {
      contractViolation('a component can only be mounted into an element without other children');
    }
    this.slots.push(new ComponentSlot(handle));
  }

  /** Remove every slot from `parent` and dispose it */
  clear(parent: HostNode): void {
    this.clearAfter(0, parent);
  }

  /** Remove and dispose every slot at position `index` or later */
  clearAfter(index: number, parent: HostNode): void {
    if (index >= this.slots.length) return;
    for (const slot of this.slots.splice(index)) {
      removeSlot(this.renderer, slot, parent);
    }
  }

  /** Dispose every slot without touching the host tree */
  dispose(): void {
    for (const slot of this.slots) {
      disposeSlot(slot);
    }
  }

  /**
   * Append clones of `source`'s slots to `parent`. Used by Element.clone().
   */
  appendClonesOf(source: Nodes, parent: HostNode): void {
    for (const slot of source.slots) {
      if (slot instanceof Element) {
        const clone = slot.clone();
        this.renderer.appendChild(parent, clone.host);
        this.slots.push(clone);
      } else if (slot instanceof TextNode) {
        const host = this.renderer.createTextNode(slot.text);
        this.renderer.appendChild(parent, host);
        this.slots.push(new TextNode(host, slot.text));
      } else if (slot instanceof GroupedNodes) {
        const group = new GroupedNodes(this.renderer);
        this.renderer.appendChild(parent, group.endMarker);
        this.slots.push(group);
      } else {
        contractViolation('an element with a mounted component cannot be cloned; render this list with mode \'new\'');
      }
    }
  }
}

function removeSlot(renderer: IRendererAdapter, slot: NodeSlot, parent: HostNode): void {
  if (slot instanceof Element) {
    renderer.removeChild(parent, slot.host);
    slot.dispose();
  } else if (slot instanceof TextNode) {
    renderer.removeChild(parent, slot.host);
  } else if (slot instanceof GroupedNodes) {
    slot.clear(parent);
    slot.dispose();
  } else {
    slot.handle.release();
  }
}

function disposeSlot(slot: NodeSlot): void {
  if (slot instanceof Element || slot instanceof GroupedNodes) {
    slot.dispose();
  } else if (slot instanceof ComponentSlot) {
    slot.handle.release();
  }
}
