import {
  CategoryRuleSet,
  addCategory,
  classify,
  createDefaultRules,
  getCategoryNames,
  normalizeExtension,
  parseExtensionList,
  removeCategory,
  rulesFromTable,
  rulesFromTableSkippingInvalid,
  rulesToTable,
  updateCategory,
} from '../../core/category-rules';
import { DuplicateCategoryError, IndexOutOfRangeError, InvalidCategoryError } from '../../core/errors';

describe('category rules', () => {
  const rules: CategoryRuleSet = rulesFromTable({
    Photos: ['.jpg', '.png'],
    Documents: ['.txt', '.pdf'],
    Archives: ['.tar.gz', '.zip'],
  });

  describe('normalizeExtension', () => {
    it('should lowercase and add a single leading dot', () => {
      expect(normalizeExtension('JPG')).toBe('.jpg');
      expect(normalizeExtension('.Png')).toBe('.png');
      expect(normalizeExtension('..tar.gz')).toBe('.tar.gz');
      expect(normalizeExtension('  md ')).toBe('.md');
    });

    it('should return an empty string for blank input', () => {
      expect(normalizeExtension('')).toBe('');
      expect(normalizeExtension(' . ')).toBe('');
    });
  });

  describe('parseExtensionList', () => {
    it('should split comma-separated input and drop empties and duplicates', () => {
      expect(parseExtensionList('jpg, .PNG,, tiff, .jpg')).toEqual(['.jpg', '.png', '.tiff']);
    });

    it('should accept an array', () => {
      expect(parseExtensionList(['MP3', 'wav'])).toEqual(['.mp3', '.wav']);
    });
  });

  describe('classify', () => {
    it('should match extensions case-insensitively', () => {
      expect(classify('holiday.JPG', rules)).toBe('Photos');
      expect(classify('notes.txt', rules)).toBe('Documents');
    });

    it('should support multi-part extensions', () => {
      expect(classify('backup.tar.gz', rules)).toBe('Archives');
    });

    it('should return Others for unknown extensions and names without one', () => {
      expect(classify('c.unknownext', rules)).toBe('Others');
      expect(classify('README', rules)).toBe('Others');
      expect(classify('', rules)).toBe('Others');
    });

    it('should let the first matching rule win', () => {
      const overlapping = rulesFromTable({
        Images: ['.png'],
        Graphics: ['.png', '.svg'],
      });

      expect(classify('logo.png', overlapping)).toBe('Images');
      expect(classify('logo.svg', overlapping)).toBe('Graphics');
    });

    it('should always return a configured category or Others', () => {
      const allowed = [...getCategoryNames(rules), 'Others'];
      for (const name of ['a.jpg', 'b.PDF', 'c', '.hidden', 'd.tar.gz', 'e.zip.part']) {
        expect(allowed).toContain(classify(name, rules));
      }
    });
  });

  describe('addCategory', () => {
    it('should append a rule with normalised extensions', () => {
      const updated = addCategory(rules, 'Ebooks', 'EPUB, mobi');

      expect(getCategoryNames(updated)).toEqual(['Photos', 'Documents', 'Archives', 'Ebooks']);
      expect(updated[3].extensions).toEqual(['.epub', '.mobi']);
      expect(rules).toHaveLength(3);
    });

    it('should reject duplicate names and the reserved Others name', () => {
      expect(() => addCategory(rules, 'Photos', 'heic')).toThrow(DuplicateCategoryError);
      expect(() => addCategory(rules, 'Others', 'bin')).toThrow("Category 'Others' already exists");
    });

    it('should reject empty names, unusable folder names and empty extension lists', () => {
      expect(() => addCategory(rules, '  ', 'bin')).toThrow(InvalidCategoryError);
      expect(() => addCategory(rules, 'a/b', 'bin')).toThrow(InvalidCategoryError);
      expect(() => addCategory(rules, '__proto__', 'bin')).toThrow(
        "Category name '__proto__' is not a valid folder name"
      );
      expect(() => addCategory(rules, 'Binaries', ' , ')).toThrow(
        "Category 'Binaries' needs at least one extension"
      );
    });
  });

  describe('updateCategory', () => {
    it('should replace extensions and keep the position', () => {
      const updated = updateCategory(rules, 1, ['docx']);

      expect(getCategoryNames(updated)).toEqual(['Photos', 'Documents', 'Archives']);
      expect(updated[1].extensions).toEqual(['.docx']);
      expect(classify('notes.txt', updated)).toBe('Others');
    });

    it('should throw IndexOutOfRangeError for a bad index', () => {
      expect(() => updateCategory(rules, 3, 'txt')).toThrow(IndexOutOfRangeError);
      expect(() => updateCategory(rules, -1, 'txt')).toThrow('Index -1 is out of range (3 items)');
    });
  });

  describe('removeCategory', () => {
    it('should remove the rule at the index and return it', () => {
      const { rules: remaining, removed } = removeCategory(rules, 0);

      expect(removed.name).toBe('Photos');
      expect(getCategoryNames(remaining)).toEqual(['Documents', 'Archives']);
      expect(classify('a.jpg', remaining)).toBe('Others');
    });

    it('should throw IndexOutOfRangeError for a bad index', () => {
      expect(() => removeCategory(rules, 5)).toThrow(IndexOutOfRangeError);
    });
  });

  describe('tables', () => {
    it('should convert rules to a table and back keeping order', () => {
      const table = rulesToTable(rules);

      expect(Object.keys(table)).toEqual(['Photos', 'Documents', 'Archives']);
      expect(rulesFromTable(table)).toEqual(rules);
    });

    it('should leave out invalid categories and report why', () => {
      const { rules: loaded, rejected } = rulesFromTableSkippingInvalid({
        Photos: ['.jpg'],
        Empty: [],
        Documents: ['txt'],
      });

      expect(getCategoryNames(loaded)).toEqual(['Photos', 'Documents']);
      expect(rejected).toEqual(["Category 'Empty' needs at least one extension"]);
    });

    it('should provide the built-in default categories', () => {
      const defaults = createDefaultRules();

      expect(getCategoryNames(defaults)).toEqual([
        'Videos',
        'Photos',
        'Music',
        'Documents',
        'Archives',
        'Code',
        'Executables',
      ]);
      expect(classify('a.jpg', defaults)).toBe('Photos');
      expect(classify('b.txt', defaults)).toBe('Documents');
      expect(classify('run.sh', defaults)).toBe('Executables');
    });
  });
});
