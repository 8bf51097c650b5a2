import { describe, it, expect } from 'vitest';
import { DomIndexer } from '../../src/dom/dom-indexer.js';
import { collapseWhitespace } from '../../src/dom/element-tree.js';
import { loadFixture } from '../helpers/fakes.js';

describe('ElementTree', () => {
  const state = new DomIndexer({ viewportExpansion: 500 }).index(loadFixture('search-page.json'));
  const tree = state.tree;

  function handleOf(xpath: string, frameChain: string[] = []): number {
    for (const node of tree.walk()) {
      if (node.type === 'element' && node.xpath === xpath && node.frameChain.join() === frameChain.join()) {
        return node.handle;
      }
    }
    throw new Error(`no element ${xpath}`);
  }

  it('walks the arena in document order from the root', () => {
    const tags = [...tree.walk()].flatMap((node) => (node.type === 'element' ? [node.tagName] : []));
    expect(tags.slice(0, 6)).toEqual(['html', 'body', 'h1', 'form', 'input', 'button']);
    expect(tags[tags.length - 1]).toBe('button');
  });

  it('links parents and children by handle', () => {
    const form = handleOf('/html/body/form');
    expect(tree.children(form).map((node) => (node.type === 'element' ? node.tagName : 'text'))).toEqual([
      'input',
      'button',
    ]);
    const body = handleOf('/html/body');
    expect(tree.node(form).parent).toBe(body);
  });

  it('lists ancestors across the frame boundary', () => {
    const pay = handleOf('/html/body/button', ['/html/body/iframe']);
    expect([...tree.ancestors(pay)].map((node) => node.tagName)).toEqual(['body', 'html', 'iframe', 'body', 'html']);
  });

  it('collects text up to the next highlighted element', () => {
    expect(tree.textUntilNextClickable(handleOf('/html/body/h1'))).toBe('Product search');
    expect(tree.textUntilNextClickable(handleOf('/html/body/form'))).toBe('');
    expect(tree.textUntilNextClickable(handleOf('/html/body/div/button'))).toBe('Buy');
  });

  it('knows which nodes sit under a highlighted element', () => {
    const buy = handleOf('/html/body/div/button');
    const buyText = tree.node(buy);
    expect(buyText.type === 'element' && tree.hasHighlightedAncestor(buyText.children[0])).toBe(true);
    expect(tree.hasHighlightedAncestor(handleOf('/html/body/h1'))).toBe(false);
  });

  it('rejects unknown handles', () => {
    expect(() => tree.node(tree.size)).toThrow(RangeError);
    expect(tree.element(tree.size)).toBeUndefined();
  });
});

describe('collapseWhitespace', () => {
  it('folds runs of whitespace and trims', () => {
    expect(collapseWhitespace('  a\n\t b  ')).toBe('a b');
  });
});
