/**
 * Spindle Core - Render Walkers
 *
 * Render functions describe a component by calling methods on these walkers.
 * A walker keeps two cursors, one over the element's attribute cache and one
 * over its child slots, and advances them with every call. Nothing is built
 * and thrown away: on the first pass the calls create nodes, on later passes
 * the same calls find those nodes at the same positions and write only what
 * changed.
 *
 * Render functions must therefore be positionally stable: the same sequence
 * of attribute and child calls on every pass. Conditional content goes through
 * matchIf(), variable-length content through list() or keyedList().
 */

import type { HostElement, HostListener, HostNode, IRendererAdapter } from '../renderers/types.js';
import type { ChildComp, Comp } from './component.js';
import { contractViolation } from './errors.js';
import { listen } from './events.js';
import { KeyedList, type KeyValue } from './keyed-list.js';
import { warn } from './log.js';
import { Element, type GroupedNodes, type Nodes } from './nodes.js';
import { reconcileKeyedList } from './reconcile.js';
import { SafeHTML } from './safe-html.js';
import { ElementStatus, SVG_NAMESPACE, type ListElementCreation } from './symbols.js';

export interface RenderContext<S extends object> {
  readonly comp: Comp<S>;
  readonly state: S;
}

/** Values accepted as text content */
export type Printable = string | number | boolean | bigint;

export type ItemRender<S extends object, I> = (item: I, element: ElementRender<S>) => void;

/**
 * Walks a sequence of child slots: the children of an element, or the
 * content of a match-if arm.
 */
export class NodesRender<S extends object> {
  protected index = 0;
  private updateMode = true;

  constructor(
    protected readonly ctx: RenderContext<S>,
    protected readonly renderer: IRendererAdapter,
    protected readonly nodes: Nodes,
    protected readonly parent: HostNode,
    /** Anchor new nodes are inserted before; null appends */
    protected readonly nextSibling: HostNode | null,
    readonly status: ElementStatus,
    protected readonly namespace: string | null
  ) {}

  get state(): S {
    return this.ctx.state;
  }

  get comp(): Comp<S> {
    return this.ctx.comp;
  }

  /** Static content is only visited while its parent is new or cloned */
  protected requiresRender(): boolean {
    return this.updateMode || this.status !== ElementStatus.Existing;
  }

  /** Text that is rewritten whenever it changes */
  text(value: Printable): this {
    if (!this.updateMode) {
      return this.staticText(value);
    }
    this.nodes.updateText(this.index++, String(value), this.parent, this.nextSibling);
    return this;
  }

  /** Text written once, when created */
  staticText(value: Printable): this {
    this.nodes.staticText(this.index++, String(value), this.parent, this.nextSibling);
    return this;
  }

  /** Child element in the current namespace */
  child(tag: string, render?: (element: ElementRender<S>) => void): this {
    return this.childElement(tag, this.namespace, render);
  }

  /** `<svg>` child; its descendants are created in the SVG namespace */
  svg(render?: (element: ElementRender<S>) => void): this {
    return this.childElement('svg', SVG_NAMESPACE, render);
  }

  private childElement(tag: string, namespace: string | null, render?: (element: ElementRender<S>) => void): this {
    if (!this.requiresRender()) {
      this.nodes.elementAt(this.index++, tag);
      return this;
    }
    const status = this.nodes.checkOrCreateElement(
      tag, namespace, this.index, this.status, this.parent, this.nextSibling
    );
    const element = this.nodes.elementAt(this.index++, tag);
    const er = new ElementRender(this.ctx, element, status);
    render?.(er);
    er.finish();
    return this;
  }

  /**
   * Render the children emitted by `render` as static content: they are
   * created (and rebound after cloning) but never updated.
   */
  staticNodes(render: (nodes: this) => void): this {
    const previous = this.updateMode;
    this.updateMode = false;
    try {
      render(this);
    } finally {
      this.updateMode = previous;
    }
    return this;
  }

  /**
   * Conditional content. `render` selects one arm with renderOnArm(); each arm
   * has a stable index. Switching arms replaces the content.
   *
   * @example
   * root.matchIf(m => state.user
   *   ? m.renderOnArm(0, n => n.text(`Hello ${state.user.name}`))
   *   : m.renderOnArm(1, n => n.child('button', b => b.text('Sign in'))));
   */
  matchIf(render: (arms: MatchIfRender<S>) => void): this {
    const group = this.nodes.groupedNodes(this.index++, this.parent, this.nextSibling);
    if (!this.requiresRender()) {
      return this;
    }
    const arms = new MatchIfRender(this.ctx, this.renderer, group, this.parent, this.namespace);
    render(arms);
    arms.finish();
    return this;
  }

  /**
   * Positional list: item i always renders into element i. In 'clone' mode
   * new elements are copies of the first item.
   */
  list<I>(
    items: Iterable<I>,
    tag: string,
    render: ItemRender<S, I>,
    mode: ListElementCreation = 'clone'
  ): this {
    const group = this.nodes.groupedNodes(this.index++, this.parent, this.nextSibling);
    if (!this.requiresRender()) {
      return this;
    }
    const nodes = group.nodes;
    let index = 0;
    for (const item of items) {
      const status = nodes.checkOrCreateElementForList(
        tag, this.namespace, index, this.parent, group.endMarker, mode
      );
      const er = new ElementRender(this.ctx, nodes.elementAt(index, tag), status);
      render(item, er);
      er.finish();
      index++;
    }
    nodes.clearAfter(index, this.parent);
    return this;
  }

  /** Remove slots left over from a longer previous pass */
  finish(): void {
    this.nodes.clearAfter(this.index, this.parent);
  }
}

/**
 * Arm selector handed to matchIf() callbacks.
 */
export class MatchIfRender<S extends object> {
  private selected = false;

  constructor(
    private readonly ctx: RenderContext<S>,
    private readonly renderer: IRendererAdapter,
    private readonly group: GroupedNodes,
    private readonly parent: HostNode,
    private readonly namespace: string | null
  ) {}

  get state(): S {
    return this.ctx.state;
  }

  renderOnArm(index: number, render: (nodes: NodesRender<S>) => void): void {
    if (this.selected) {
      contractViolation('matchIf() can render only one arm per pass');
    }
    this.selected = true;
    const status = this.group.selectArm(index, this.parent);
    const nodes = new NodesRender(
      this.ctx, this.renderer, this.group.nodes, this.parent, this.group.endMarker, status, this.namespace
    );
    render(nodes);
    nodes.finish();
  }

  /** No arm selected this pass: the fragment is emptied */
  finish(): void {
    if (!this.selected) {
      this.group.deselect(this.parent);
    }
  }
}

/**
 * Walks one element: its attributes and its children.
 */
export class ElementRender<S extends object> extends NodesRender<S> {
  private attrIndex = 0;
  private selectValue: string | null = null;

  constructor(ctx: RenderContext<S>, readonly element: Element, status: ElementStatus) {
    super(ctx, element.renderer, element.nodes, element.host, null, status, element.namespace);
  }

  get host(): HostElement {
    return this.element.host;
  }

  // === ATTRIBUTES ===

  attr(name: string, value: string): this {
    if (this.element.attributes.checkStr(this.attrIndex++, value)) {
      this.renderer.setAttribute(this.host, name, value);
    }
    return this;
  }

  /** Present as `name=""` when true, absent when false */
  boolAttr(name: string, value: boolean): this {
    if (this.element.attributes.checkBool(this.attrIndex++, value)) {
      if (value) {
        this.renderer.setAttribute(this.host, name, '');
      } else {
        this.renderer.removeAttribute(this.host, name);
      }
    }
    return this;
  }

  i32Attr(name: string, value: number): this {
    if (this.element.attributes.checkI32(this.attrIndex++, value)) {
      this.renderer.setAttribute(this.host, name, String(value));
    }
    return this;
  }

  u32Attr(name: string, value: number): this {
    if (this.element.attributes.checkU32(this.attrIndex++, value)) {
      this.renderer.setAttribute(this.host, name, String(value));
    }
    return this;
  }

  f64Attr(name: string, value: number): this {
    if (this.element.attributes.checkF64(this.attrIndex++, value)) {
      this.renderer.setAttribute(this.host, name, String(value));
    }
    return this;
  }

  id(value: string): this {
    return this.attr('id', value);
  }

  className(value: string): this {
    return this.attr('class', value);
  }

  /** Add or remove a single class */
  classIf(className: string, on: boolean): this {
    if (this.element.attributes.checkBool(this.attrIndex++, on)) {
      if (on) {
        this.renderer.addClass(this.host, className);
      } else {
        this.renderer.removeClass(this.host, className);
      }
    }
    return this;
  }

  /** Written when the element is created; takes no cache slot */
  staticAttr(name: string, value: string): this {
    if (this.status === ElementStatus.JustCreated) {
      this.renderer.setAttribute(this.host, name, value);
    }
    return this;
  }

  staticBoolAttr(name: string, value: boolean): this {
    if (this.status === ElementStatus.JustCreated && value) {
      this.renderer.setAttribute(this.host, name, '');
    }
    return this;
  }

  /**
   * Live value of an input, textarea or select. A select only accepts a
   * value matching one of its options, so for selects the write waits until
   * this element's children have been rendered.
   */
  value(value: string): this {
    if (!this.element.attributes.checkStr(this.attrIndex++, value)) {
      return this;
    }
    if (this.renderer.isSelectElement(this.host)) {
      this.selectValue = value;
    } else if (!this.renderer.setValue(this.host, value)) {
      warn(`.value() is called on <${this.element.tag}>, which is not <input>, <select> or <textarea>`);
    }
    return this;
  }

  checked(value: boolean): this {
    if (this.element.attributes.checkBool(this.attrIndex++, value)) {
      if (!this.renderer.setChecked(this.host, value)) {
        warn(`.checked() is called on <${this.element.tag}>, which is not <input>`);
      }
    }
    return this;
  }

  /** Focus the element when `value` turns true */
  focus(value: boolean): this {
    if (this.element.attributes.checkBool(this.attrIndex++, value) && value) {
      this.renderer.focus(this.host);
    }
    return this;
  }

  /**
   * Replace the element's content with sanitized markup. The element must
   * have no other children.
   */
  html(value: SafeHTML): this {
    if (!SafeHTML.isSafeHTML(value)) {
      throw new TypeError('Spindle: html() requires a SafeHTML instance. Use SafeHTML.sanitize(html).');
    }
    if (this.index > 0 || this.element.nodes.count > 0 || this.element.keyedList) {
      contractViolation(`html() on <${this.element.tag}> cannot be combined with other children`);
    }
    this.element.hasRawHtml = true;
    if (this.element.attributes.checkStr(this.attrIndex++, value.toString())) {
      this.renderer.setInnerHTML(this.host, value);
    }
    return this;
  }

  /**
   * Bind an event handler. The handler is bound when the element is created
   * or cloned and kept afterwards; later passes do not replace it.
   */
  on(type: string, handler: HostListener): this {
    const index = this.attrIndex++;
    if (this.status === ElementStatus.Existing) {
      this.element.attributes.expectListener(index);
      return this;
    }
    this.element.attributes.storeListener(index, listen(this.renderer, this.host, type, handler));
    return this;
  }

  // === CHILDREN ===

  private assertSoleContent(what: string): void {
    if (this.index > 0 || this.element.hasRawHtml) {
      contractViolation(`${what} must be the only content of <${this.element.tag}>`);
    }
  }

  /**
   * Keyed list: the element's children become one element per item,
   * matched across passes by key. Reused elements are moved, not rebuilt.
   * In 'clone' mode new elements are copies of an off-tree template.
   */
  keyedList<I>(
    items: Iterable<I>,
    tag: string,
    getKey: (item: I) => KeyValue,
    render: ItemRender<S, I>,
    mode: ListElementCreation = 'clone'
  ): this {
    this.assertSoleContent('a keyed list');
    if (this.element.nodes.count > 0) {
      contractViolation(`a keyed list must be the only content of <${this.element.tag}>`);
    }
    // Mark the position as taken so later child calls are rejected.
    this.index = 1;
    if (!this.requiresRender()) {
      return this;
    }

    const list = this.element.keyedList ?? (this.element.keyedList = new KeyedList());
    const renderer = this.renderer;
    const namespace = this.namespace;

    list.lastStats = reconcileKeyedList({
      list,
      items: Array.from(items),
      parent: this.host,
      renderer,
      config: {
        getKey: item => getKey(item),
        createElement: item => {
          if (mode === 'new') {
            const element = Element.create(renderer, tag, namespace);
            this.renderItem(element, item, ElementStatus.JustCreated, render);
            return element;
          }
          const template = list.ensureTemplate(() => Element.create(renderer, tag, namespace));
          if (!template.rendered) {
            this.renderItem(template.element, item, ElementStatus.JustCreated, render);
            template.rendered = true;
          }
          const element = template.element.clone();
          this.renderItem(element, item, ElementStatus.JustCloned, render);
          return element;
        },
        updateElement: (element, item) => this.renderItem(element, item, ElementStatus.Existing, render)
      }
    });

    this.applySelectValue();
    return this;
  }

  private renderItem<I>(element: Element, item: I, status: ElementStatus, render: ItemRender<S, I>): void {
    const er = new ElementRender(this.ctx, element, status);
    render(item, er);
    er.finish();
  }

  /**
   * Mount a child component into this element. The component renders the
   * element's content; it stays mounted across passes and is unmounted when
   * this element is removed or another component takes its place.
   */
  component<C extends object>(child: ChildComp<C>): this {
    this.assertSoleContent('a component');
    if (this.element.keyedList) {
      contractViolation(`<${this.element.tag}> holds a keyed list and cannot mount a component`);
    }
    const current = this.element.nodes.componentHandle();
    if (current === null || !child.ownsHandle(current)) {
      this.element.nodes.clear(this.host);
      this.element.nodes.storeComponentHandle(child.mountTo(this.renderer, this.host));
    }
    this.index = 1;
    return this;
  }

  override finish(): void {
    super.finish();
    this.applySelectValue();
  }

  private applySelectValue(): void {
    if (this.selectValue !== null) {
      this.renderer.setValue(this.host, this.selectValue);
      this.selectValue = null;
    }
  }
}
