import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { buildSampleTree, loadSamples, parseSamples, SampleFileError } from '../sample-loader.js';

const SAMPLES_FILE = fileURLToPath(new URL('../../samples.json', import.meta.url));

describe('Sample loader', () => {
  describe('loadSamples', () => {
    it('should load the bundled samples with keys as decimal strings', async () => {
      const samples = await loadSamples(SAMPLES_FILE);

      expect([...samples.keys()]).toEqual(['sample1', 'sample2', 'descending', 'zigzag', 'duplicates', 'decimals']);
      expect(samples.get('sample1')?.keys).toEqual(['10', '20', '30', '40', '50', '60', '70', '80', '90', '100']);
      expect(samples.get('sample2')?.keys).toEqual(['40', '20', '70', '10', '30', '35', '37']);
      expect(samples.get('decimals')?.keys).toEqual(['0.1', '0.02', '1e3', '1000.5', '0.3', '7']);
    });

    it('should report a missing file', async () => {
      await expect(loadSamples('/nonexistent/samples.json')).rejects.toBeInstanceOf(SampleFileError);
      await expect(loadSamples('/nonexistent/samples.json')).rejects.toThrow(
        'Cannot read samples from /nonexistent/samples.json'
      );
    });
  });

  describe('parseSamples', () => {
    it('should default a missing description to an empty string', () => {
      const samples = parseSamples({ tiny: { keys: [1, '2.5'] } }, 'inline');
      expect(samples.get('tiny')).toEqual({ name: 'tiny', description: '', keys: ['1', '2.5'] });
    });

    it('should reject documents that are not objects', () => {
      expect(() => parseSamples([1, 2, 3], 'inline')).toThrow(SampleFileError);
      expect(() => parseSamples([1, 2, 3], 'inline')).toThrow('Invalid samples in inline: Expected object, received array');
      expect(() => parseSamples(null, 'inline')).toThrow('Invalid samples in inline: Expected object, received null');
    });

    it('should reject samples without keys', () => {
      expect(() => parseSamples({ bad: { description: 'no keys' } }, 'inline')).toThrow(
        'Invalid samples in inline: bad.keys: Required'
      );
    });

    it('should reject keys that are not decimal numbers', () => {
      expect(() => parseSamples({ bad: { keys: [1, 'two'] } }, 'inline')).toThrow(SampleFileError);
      expect(() => parseSamples({ bad: { keys: [1, 'two'] } }, 'inline')).toThrow('Invalid samples in inline: bad.keys.1');
    });
  });

  describe('buildSampleTree', () => {
    it('should build a valid tree from double rotations on both sides', () => {
      const tree = buildSampleTree({ name: 'zigzag', description: '', keys: ['30', '10', '20', '50', '40'] });

      expect([...tree]).toEqual(['10', '20', '30', '40', '50']);
      expect(tree.getStats()).toEqual({ colorFlips: 1, leftRotations: 2, rightRotations: 2 });
      expect(tree.validate().valid).toBe(true);
    });

    it('should order decimal keys by value rather than as text', () => {
      const tree = buildSampleTree({ name: 'decimals', description: '', keys: ['0.1', '0.02', '1e3', '1000.5', '0.3', '7'] });

      expect([...tree]).toEqual(['0.02', '0.1', '0.3', '7', '1e3', '1000.5']);
      expect(tree.search('1000')?.key).toBe('1e3');
      expect(tree.getStats()).toEqual({ colorFlips: 2, leftRotations: 0, rightRotations: 0 });
      expect(tree.validate().valid).toBe(true);
    });
  });
});
