import {
  cloneStatistics,
  createEmptyStatistics,
  formatSize,
  formatSummary,
} from '../../core/run-statistics';

describe('run statistics', () => {
  describe('createEmptyStatistics', () => {
    it('should seed a zero counter for every category plus Others', () => {
      const stats = createEmptyStatistics(['Photos', 'Documents']);

      expect(stats).toEqual({
        totalFiles: 0,
        organizedFiles: 0,
        skippedFiles: 0,
        totalSizeBytes: 0,
        perCategoryCount: { Photos: 0, Documents: 0, Others: 0 },
      });
      expect(Object.keys(stats.perCategoryCount)).toEqual(['Photos', 'Documents', 'Others']);
    });
  });

  it('should clone without sharing the category counters', () => {
    const stats = createEmptyStatistics(['Photos']);
    const copy = cloneStatistics(stats);
    copy.perCategoryCount.Photos = 4;
    copy.totalFiles = 4;

    expect(stats.perCategoryCount.Photos).toBe(0);
    expect(stats.totalFiles).toBe(0);
  });

  describe('formatSize', () => {
    it('should format bytes with two decimals', () => {
      expect(formatSize(0)).toBe('0.00 B');
      expect(formatSize(512)).toBe('512.00 B');
      expect(formatSize(1023)).toBe('1023.00 B');
    });

    it('should step up by 1024', () => {
      expect(formatSize(1024)).toBe('1.00 KB');
      expect(formatSize(1536)).toBe('1.50 KB');
      expect(formatSize(1024 * 1024)).toBe('1.00 MB');
      expect(formatSize(3 * 1024 * 1024 * 1024)).toBe('3.00 GB');
    });

    it('should not go beyond GB', () => {
      expect(formatSize(5 * 1024 ** 4)).toBe('5120.00 GB');
    });
  });

  describe('formatSummary', () => {
    it('should render the summary with non-zero categories in order', () => {
      const stats = createEmptyStatistics(['Photos', 'Music', 'Documents']);
      stats.totalFiles = 3;
      stats.organizedFiles = 3;
      stats.skippedFiles = 1;
      stats.totalSizeBytes = 2048;
      stats.perCategoryCount.Photos = 1;
      stats.perCategoryCount.Documents = 1;
      stats.perCategoryCount.Others = 1;

      expect(formatSummary(stats)).toBe(
        'Organization Summary:\n' +
          'Total files processed: 3\n' +
          'Files organized: 3\n' +
          'Files skipped: 1\n' +
          'Total size processed: 2.00 KB\n' +
          '\n' +
          'Files by category:\n' +
          '  - Photos: 1\n' +
          '  - Documents: 1\n' +
          '  - Others: 1\n'
      );
    });

    it('should render an empty category section for an empty run', () => {
      expect(formatSummary(createEmptyStatistics([]))).toBe(
        'Organization Summary:\n' +
          'Total files processed: 0\n' +
          'Files organized: 0\n' +
          'Files skipped: 0\n' +
          'Total size processed: 0.00 B\n' +
          '\n' +
          'Files by category:\n'
      );
    });
  });
});
