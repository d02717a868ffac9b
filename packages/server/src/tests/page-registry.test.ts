import { describe, it, expect, beforeEach } from 'vitest';
import { PageRegistry } from '../deck/page-registry.js';
import { LoadError, UnknownSlideError } from '../errors.js';
import { FakePdf } from './fakes.js';

describe('PageRegistry', () => {
  let pdf: FakePdf;
  let registry: PageRegistry;

  beforeEach(() => {
    pdf = new FakePdf().addFile('a.pdf', 3).addFile('b.pdf', 2);
    registry = new PageRegistry(pdf);
  });

  it('opens a path once and returns the cached handle afterwards', async () => {
    const first = await registry.registerDocument('a.pdf');
    const second = await registry.registerDocument('a.pdf');
    expect(second).toBe(first);
    expect(pdf.opened).toEqual(['a.pdf']);
  });

  it('wraps open failures in LoadError', async () => {
    const error = await registry.registerDocument('broken.pdf').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(LoadError);
    expect(error).toMatchObject({
      name: 'LoadError',
      path: 'broken.pdf',
      message: 'Failed to load: broken.pdf: Not a PDF: broken.pdf',
    });
  });

  it('does not remember a path that failed to open', async () => {
    await expect(registry.registerDocument('late.pdf')).rejects.toBeInstanceOf(LoadError);
    pdf.addFile('late.pdf', 1);
    await expect(registry.registerDocument('late.pdf')).resolves.toMatchObject({ path: 'late.pdf', pageCount: 1 });
    expect(pdf.opened).toEqual(['late.pdf', 'late.pdf']);
  });

  it('assigns ids in import order across documents', async () => {
    const a = await registry.registerDocument('a.pdf');
    const b = await registry.registerDocument('b.pdf');

    expect(registry.addPages(a, 3)).toEqual([0, 1, 2]);
    expect(registry.addPages(b, 2)).toEqual([3, 4]);
    expect(registry.size).toBe(5);

    expect(registry.source(0)).toEqual({ path: 'a.pdf', pageIndex: 0 });
    expect(registry.source(2)).toEqual({ path: 'a.pdf', pageIndex: 2 });
    expect(registry.source(3)).toEqual({ path: 'b.pdf', pageIndex: 0 });
    expect(registry.source(4)).toEqual({ path: 'b.pdf', pageIndex: 1 });
    expect(registry.resolve(4).document).toBe(b);
  });

  it('never reuses ids when the same document is added again', async () => {
    const a = await registry.registerDocument('a.pdf');
    registry.addPages(a);
    expect(registry.addPages(a)).toEqual([3, 4, 5]);
    expect(registry.source(5)).toEqual({ path: 'a.pdf', pageIndex: 2 });
  });

  it('throws UnknownSlideError for ids never registered', () => {
    expect(registry.has(7)).toBe(false);
    expect(() => registry.resolve(7)).toThrow(UnknownSlideError);
    expect(() => registry.resolve(7)).toThrow('Unknown slide id: 7');
  });
});
