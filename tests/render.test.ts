/**
 * Render Walker Tests
 *
 * Mounts small components on the VirtualRenderer and asserts the exact
 * journal of host writes each pass produces.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Application } from '../src/core/app.js';
import type { ComponentDefinition } from '../src/core/component.js';
import { ContractViolationError } from '../src/core/errors.js';
import { SafeHTML } from '../src/core/safe-html.js';
import { SVG_NAMESPACE } from '../src/core/symbols.js';
import { VirtualRenderer, type VNode } from '../src/renderers/virtual.js';

function mount<S extends object>(definition: ComponentDefinition<S>) {
  const renderer = new VirtualRenderer();
  const root = renderer.createElement('main');
  renderer.takeLog();
  const app = new Application(definition, { renderer }).mount(root);
  return { renderer, root, app };
}

function childAt(node: VNode, ...path: number[]): VNode {
  let current = node;
  for (const index of path) {
    const next = current.childNodes[index];
    if (next === undefined) {
      throw new Error(`no child at ${index}`);
    }
    current = next;
  }
  return current;
}

function elementsOf(node: VNode, tagName: string): VNode[] {
  return node.childNodes.filter(child => child.tagName === tagName);
}

afterEach(() => {
  vi.restoreAllMocks();
});

interface Profile {
  name: string;
  age: number;
  score: number;
  admin: boolean;
  hidden: boolean;
  clicks: number;
}

const profile: ComponentDefinition<Profile> = {
  init: () => ({ name: 'Ann', age: 30, score: 1.5, admin: false, hidden: false, clicks: 0 }),
  render(state, root) {
    root.child('div', div => div
      .className('card')
      .boolAttr('hidden', state.hidden)
      .u32Attr('data-age', state.age)
      .f64Attr('data-score', state.score)
      .classIf('admin', state.admin)
      .on('click', root.comp.handler(s => { s.clicks++; }))
      .text(state.name));
  }
};

describe('Render passes', () => {
  it('creates every node and attribute on the first pass', () => {
    const { renderer, root } = mount(profile);

    expect(renderer.takeLog()).toEqual([
      'create DIV',
      'insert DIV',
      'setAttribute DIV class="card"',
      'removeAttribute DIV hidden',
      'setAttribute DIV data-age="30"',
      'setAttribute DIV data-score="1.5"',
      'removeClass DIV admin',
      'listen DIV click',
      'create #text "Ann"',
      'insert #text'
    ]);
    expect(renderer.serialize(root)).toBe('<main><div class="card" data-age="30" data-score="1.5">Ann</div></main>');
  });

  it('writes nothing when the state is unchanged', () => {
    const { renderer, app } = mount(profile);
    renderer.takeLog();

    app.comp.update(() => {});

    expect(renderer.takeLog()).toEqual([]);
  });

  it('writes only the attributes that changed', () => {
    const { renderer, root, app } = mount(profile);
    renderer.takeLog();

    app.comp.update(s => {
      s.age = 31;
      s.admin = true;
      s.hidden = true;
    });

    expect(renderer.takeLog()).toEqual([
      'setAttribute DIV hidden=""',
      'setAttribute DIV data-age="31"',
      'addClass DIV admin'
    ]);
    expect(renderer.serialize(root)).toBe(
      '<main><div class="card admin" data-age="31" data-score="1.5" hidden="">Ann</div></main>'
    );
  });

  it('keeps the listener bound on the first pass', () => {
    const { renderer, root, app } = mount(profile);
    const div = childAt(root, 0);
    renderer.takeLog();

    renderer.dispatchEvent(div, 'click');
    renderer.dispatchEvent(div, 'click');

    expect(app.peek(s => s.clicks)).toBe(2);
    expect(renderer.listenerCount(div, 'click')).toBe(1);
    expect(renderer.takeLog()).toEqual([]);
  });

  it('prints numbers, booleans and bigints as text', () => {
    const { root, renderer } = mount<{ n: number }>({
      init: () => ({ n: 42 }),
      render(state, r) {
        r.text(state.n).text(true).text(10n);
      }
    });
    expect(renderer.serialize(root)).toBe('<main>42true10</main>');
  });

  describe('positional stability', () => {
    it('throws when an attribute position changes kind', () => {
      const { app } = mount<{ flip: boolean }>({
        init: () => ({ flip: false }),
        render(state, root) {
          root.child('p', p => {
            if (state.flip) {
              p.boolAttr('title', true);
            } else {
              p.attr('title', 'x');
            }
          });
        }
      });

      expect(() => app.comp.update(s => { s.flip = true; })).toThrow(ContractViolationError);
      // The component is released after the failed pass.
      expect(() => app.comp.update(s => { s.flip = false; })).not.toThrow();
    });

    it('throws when a child position changes kind', () => {
      const { app } = mount<{ flip: boolean }>({
        init: () => ({ flip: false }),
        render(state, root) {
          if (state.flip) {
            root.text('a');
          } else {
            root.child('p');
          }
        }
      });

      expect(() => app.comp.update(s => { s.flip = true; })).toThrow(ContractViolationError);
    });
  });

  describe('matchIf', () => {
    type Mode = 'on' | 'off' | 'none';

    const toggle: ComponentDefinition<{ mode: Mode }> = {
      init: () => ({ mode: 'on' }),
      render(state, root) {
        root.matchIf(m => {
          if (state.mode === 'on') {
            m.renderOnArm(0, n => n.text('on'));
          } else if (state.mode === 'off') {
            m.renderOnArm(1, n => n.child('b', b => b.text('off')));
          }
        });
        root.text('!');
      }
    };

    it('renders the selected arm before the end marker', () => {
      const { renderer, root } = mount(toggle);

      expect(renderer.takeLog()).toEqual([
        'create #comment',
        'insert #comment',
        'create #text "on"',
        'insert #text',
        'create #text "!"',
        'insert #text'
      ]);
      expect(renderer.serialize(root)).toBe('<main>on<!--end of grouped nodes-->!</main>');
    });

    it('keeps the arm when it is selected again', () => {
      const { renderer, app } = mount(toggle);
      renderer.takeLog();

      app.comp.update(() => {});

      expect(renderer.takeLog()).toEqual([]);
    });

    it('replaces the content when the arm changes', () => {
      const { renderer, root, app } = mount(toggle);
      renderer.takeLog();

      app.comp.update(s => { s.mode = 'off'; });
      expect(renderer.takeLog()).toEqual([
        'remove #text',
        'create B',
        'insert B',
        'create #text "off"',
        'insert #text'
      ]);
      expect(renderer.serialize(root)).toBe('<main><b>off</b><!--end of grouped nodes-->!</main>');

      app.comp.update(s => { s.mode = 'none'; });
      expect(renderer.takeLog()).toEqual(['remove B']);
      expect(renderer.serialize(root, { comments: false })).toBe('<main>!</main>');

      app.comp.update(s => { s.mode = 'on'; });
      expect(renderer.takeLog()).toEqual(['create #text "on"', 'insert #text']);
    });

    it('rejects two arms in one pass', () => {
      expect(() => mount<{ n: number }>({
        init: () => ({ n: 0 }),
        render(_state, root) {
          root.matchIf(m => {
            m.renderOnArm(0, n => n.text('a'));
            m.renderOnArm(1, n => n.text('b'));
          });
        }
      })).toThrow(ContractViolationError);
    });
  });

  describe('list', () => {
    const letters: ComponentDefinition<{ items: string[] }> = {
      init: () => ({ items: ['a'] }),
      render(state, root) {
        root.child('ul', ul => ul.list(state.items, 'li', (item, li) => li.attr('title', item).text(item)));
      }
    };

    it('creates the first item from scratch', () => {
      const { renderer } = mount(letters);
      expect(renderer.takeLog()).toEqual([
        'create UL',
        'insert UL',
        'create #comment',
        'insert #comment',
        'create LI',
        'insert LI',
        'setAttribute LI title="a"',
        'create #text "a"',
        'insert #text'
      ]);
    });

    it('grows by cloning the first item and writing the differences', () => {
      const { renderer, root, app } = mount(letters);
      renderer.takeLog();

      app.comp.update(s => { s.items = ['a', 'b']; });

      expect(renderer.takeLog()).toEqual([
        'clone LI',
        'create #text "a"',
        'insert #text',
        'insert LI',
        'setAttribute LI title="b"',
        'setText "b"'
      ]);
      expect(renderer.serialize(root)).toBe(
        '<main><ul><li title="a">a</li><li title="b">b</li><!--end of grouped nodes--></ul></main>'
      );
    });

    it('updates by position and removes the surplus', () => {
      const { renderer, root, app } = mount(letters);
      app.comp.update(s => { s.items = ['a', 'b']; });
      renderer.takeLog();

      app.comp.update(s => { s.items = ['b']; });

      expect(renderer.takeLog()).toEqual(['setAttribute LI title="b"', 'setText "b"', 'remove LI']);
      expect(renderer.serialize(root, { comments: false })).toBe('<main><ul><li title="b">b</li></ul></main>');
    });

    it('binds listeners on cloned items', () => {
      const { renderer, root, app } = mount<{ items: number[]; clicked: number[] }>({
        init: () => ({ items: [1], clicked: [] }),
        render(state, r) {
          r.child('ul', ul => ul.list(state.items, 'li', (item, li) => li
            .on('click', r.comp.handler(s => { s.clicked.push(item); }))
            .text(item)));
        }
      });

      app.comp.update(s => { s.items = [1, 2, 3]; });
      const items = elementsOf(childAt(root, 0), 'LI');
      for (const li of items) {
        renderer.dispatchEvent(li, 'click');
      }

      expect(items).toHaveLength(3);
      expect(items.map(li => renderer.listenerCount(li, 'click'))).toEqual([1, 1, 1]);
      expect(app.peek(s => s.clicked)).toEqual([1, 2, 3]);
    });
  });

  describe('static content', () => {
    it('is created once and never updated', () => {
      const { renderer, root, app } = mount<{ title: string }>({
        init: () => ({ title: 'A' }),
        render(state, r) {
          r.staticNodes(n => n.child('h1', h => h.staticAttr('class', 'title').text(state.title)))
            .text(state.title);
        }
      });
      expect(renderer.serialize(root)).toBe('<main><h1 class="title">A</h1>A</main>');
      renderer.takeLog();

      app.comp.update(s => { s.title = 'B'; });

      expect(renderer.takeLog()).toEqual(['setText "B"']);
      expect(renderer.serialize(root)).toBe('<main><h1 class="title">A</h1>B</main>');
    });

    it('writes a static boolean attribute only when it is set', () => {
      const { renderer, root, app } = mount<{ label: string }>({
        init: () => ({ label: 'Go' }),
        render(state, r) {
          r.child('button', b => b
            .staticBoolAttr('disabled', true)
            .staticBoolAttr('hidden', false)
            .text(state.label));
        }
      });
      expect(renderer.serialize(root)).toBe('<main><button disabled="">Go</button></main>');
      renderer.takeLog();

      app.comp.update(s => { s.label = 'Stop'; });

      expect(renderer.takeLog()).toEqual(['setText "Stop"']);
      expect(renderer.serialize(root)).toBe('<main><button disabled="">Stop</button></main>');
    });

    it('is revisited on cloned items to bind their listeners', () => {
      const { renderer, root, app } = mount<{ items: number[]; clicked: number[] }>({
        init: () => ({ items: [1], clicked: [] }),
        render(state, r) {
          r.child('ul', ul => ul.list(state.items, 'li', (item, li) => li.staticNodes(n => n.child('button', b => b
            .staticAttr('type', 'button')
            .on('click', r.comp.handler(s => { s.clicked.push(item); }))))));
        }
      });

      app.comp.update(s => { s.items = [1, 2]; });
      const buttons = elementsOf(childAt(root, 0), 'LI').map(li => childAt(li, 0));
      for (const button of buttons) {
        renderer.dispatchEvent(button, 'click');
      }

      expect(renderer.serialize(root, { comments: false })).toBe(
        '<main><ul><li><button type="button"></button></li><li><button type="button"></button></li></ul></main>'
      );
      expect(app.peek(s => s.clicked)).toEqual([1, 2]);
    });
  });

  describe('form elements', () => {
    it('applies a select value after its options exist', () => {
      const { renderer, root, app } = mount<{ options: string[]; selected: string }>({
        init: () => ({ options: ['a', 'b', 'c'], selected: 'b' }),
        render(state, r) {
          r.child('select', sel => sel
            .value(state.selected)
            .list(state.options, 'option', (o, opt) => opt.attr('value', o).text(o)));
        }
      });
      const select = childAt(root, 0);

      expect(renderer.takeLog().at(-1)).toBe('setValue SELECT "b"');
      expect(select.value).toBe('b');

      app.comp.update(s => { s.selected = 'c'; });
      expect(renderer.takeLog()).toEqual(['setValue SELECT "c"']);
      expect(select.value).toBe('c');

      app.comp.update(s => {
        s.options = ['a', 'b'];
        s.selected = 'a';
      });
      expect(renderer.takeLog()).toEqual(['remove OPTION', 'setValue SELECT "a"']);
      expect(select.value).toBe('a');
    });

    it('applies a select value after its keyed options exist', () => {
      const { renderer, root, app } = mount<{ options: string[]; selected: string }>({
        init: () => ({ options: ['a', 'b'], selected: 'b' }),
        render(state, r) {
          r.child('select', sel => sel
            .value(state.selected)
            .keyedList(state.options, 'option', o => o, (o, opt) => opt.attr('value', o).text(o)));
        }
      });
      const select = childAt(root, 0);
      expect(select.value).toBe('b');

      app.comp.update(s => {
        s.options = ['a', 'b', 'c'];
        s.selected = 'c';
      });
      expect(renderer.takeLog().at(-1)).toBe('setValue SELECT "c"');
      expect(select.value).toBe('c');

      app.comp.update(s => {
        s.options = ['c', 'a'];
        s.selected = 'a';
      });
      expect(renderer.takeLog().at(-1)).toBe('setValue SELECT "a"');
      expect(select.value).toBe('a');
      expect(elementsOf(select, 'OPTION').map(o => o.textContent)).toEqual(['c', 'a']);
    });

    it('sets input value and checked state', () => {
      const { renderer, root, app } = mount<{ text: string; on: boolean }>({
        init: () => ({ text: 'hello', on: true }),
        render(state, r) {
          r.child('input', i => i.attr('type', 'checkbox').value(state.text).checked(state.on));
        }
      });
      const input = childAt(root, 0);
      expect(input.value).toBe('hello');
      expect(input.checked).toBe(true);
      renderer.takeLog();

      app.comp.update(s => { s.on = false; });

      expect(renderer.takeLog()).toEqual(['setChecked INPUT false']);
      expect(renderer.serialize(root)).toBe('<main><input type="checkbox" /></main>');
    });

    it('warns when value() targets an element without a value', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

      mount<{ n: number }>({
        init: () => ({ n: 0 }),
        render(_state, r) {
          r.child('div', d => d.value('x'));
        }
      });

      expect(warnSpy).toHaveBeenCalledWith(
        'Spindle: .value() is called on <div>, which is not <input>, <select> or <textarea>'
      );
    });

    it('focuses only when the flag turns true', () => {
      const { renderer, app } = mount<{ editing: boolean }>({
        init: () => ({ editing: false }),
        render(state, r) {
          r.child('input', i => i.focus(state.editing));
        }
      });
      renderer.takeLog();

      app.comp.update(s => { s.editing = true; });
      expect(renderer.takeLog()).toEqual(['focus INPUT']);

      app.comp.update(() => {});
      expect(renderer.takeLog()).toEqual([]);
    });
  });

  it('creates svg descendants in the SVG namespace', () => {
    const { renderer, root } = mount<{ r: number }>({
      init: () => ({ r: 2.5 }),
      render(state, r) {
        r.svg(s => s.attr('viewBox', '0 0 10 10').child('circle', c => c.f64Attr('r', state.r)));
      }
    });

    expect(renderer.takeLog()).toEqual([
      'create svg',
      'insert svg',
      'setAttribute svg viewBox="0 0 10 10"',
      'create circle',
      'insert circle',
      'setAttribute circle r="2.5"'
    ]);
    expect(childAt(root, 0, 0).namespace).toBe(SVG_NAMESPACE);
  });

  it('rejects html() next to other children', () => {
    expect(() => mount<{ n: number }>({
      init: () => ({ n: 0 }),
      render(_state, r) {
        r.child('div', d => d.text('x').html(SafeHTML.empty()));
      }
    })).toThrow(ContractViolationError);
  });
});
