import {
  UNCATEGORIZED,
  findModule,
  isUrlInModule,
  resolveModule,
  toModuleList,
} from '../src/crawl/modules.js';

describe('modules', () => {
  const modules = toModuleList({
    pets: ['https://ex.com/pawmatch'],
    shop: ['https://ex.com/shop/', 'https://ex.com/cart'],
    shopAdmin: ['https://ex.com/shop/admin'],
    empty: [],
  });

  it('should keep declaration order', () => {
    expect(modules.map((m) => m.name)).toEqual(['pets', 'shop', 'shopAdmin', 'empty']);
    expect(findModule(modules, 'shop')?.seeds).toEqual([
      'https://ex.com/shop/',
      'https://ex.com/cart',
    ]);
  });

  describe('isUrlInModule', () => {
    it('should match the seed path and anything below it', () => {
      expect(isUrlInModule('https://ex.com/pawmatch', 'pets', modules)).toBe(true);
      expect(isUrlInModule('https://ex.com/pawmatch/profile', 'pets', modules)).toBe(true);
      expect(isUrlInModule('https://ex.com/pawmatch/?tab=2', 'pets', modules)).toBe(true);
    });

    it('should not match sibling paths sharing a prefix', () => {
      expect(isUrlInModule('https://ex.com/pawmatchx', 'pets', modules)).toBe(false);
      expect(isUrlInModule('https://ex.com/grooming', 'pets', modules)).toBe(false);
    });

    it('should ignore trailing slashes on seeds', () => {
      expect(isUrlInModule('https://ex.com/shop', 'shop', modules)).toBe(true);
      expect(isUrlInModule('https://ex.com/cart/items', 'shop', modules)).toBe(true);
    });

    it('should require the same scheme and host', () => {
      expect(isUrlInModule('http://ex.com/pawmatch', 'pets', modules)).toBe(false);
      expect(isUrlInModule('https://other.com/pawmatch', 'pets', modules)).toBe(false);
    });

    it('should match nothing for unknown or seedless modules', () => {
      expect(isUrlInModule('https://ex.com/pawmatch', 'missing', modules)).toBe(false);
      expect(isUrlInModule('https://ex.com/', 'empty', modules)).toBe(false);
    });
  });

  describe('resolveModule', () => {
    it('should return the first declared module that covers the URL', () => {
      expect(resolveModule('https://ex.com/pawmatch/profile', modules)).toBe('pets');
      expect(resolveModule('https://ex.com/shop/admin/users', modules)).toBe('shop');
    });

    it('should fall back to Uncategorized', () => {
      expect(resolveModule('https://ex.com/about', modules)).toBe(UNCATEGORIZED);
      expect(resolveModule('not a url', modules)).toBe('Uncategorized');
    });
  });
});
