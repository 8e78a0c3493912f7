/**
 * Unit Tests for the Text Normalizer
 */

import { describe, test, expect } from '@jest/globals';
import { normalizeText } from '../../../server/lib/text-normalizer';

describe('normalizeText', () => {
  test('should lowercase and fold the supported accents', () => {
    expect(normalizeText('ÁÃÂÀ éê í óõô ú ç')).toBe('aaaa ee i ooo u c');
    expect(normalizeText('Pós-Graduação')).toBe('pos-graduacao');
  });

  test('should collapse whitespace runs and trim', () => {
    expect(normalizeText('  Python\t\n  e   SQL  ')).toBe('python e sql');
  });

  test('should return an empty string for missing input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText(null)).toBe('');
    expect(normalizeText(undefined)).toBe('');
    expect(normalizeText('   ')).toBe('');
  });

  test('should leave accents outside the folding table untouched', () => {
    expect(normalizeText('Über Señor')).toBe('über señor');
  });

  test('should be insensitive to case and accents', () => {
    expect(normalizeText('São Paulo')).toBe(normalizeText('sao paulo'));
    expect(normalizeText('ENSINO MÉDIO')).toBe(normalizeText('ensino medio'));
  });

  test('should be idempotent', () => {
    const samples = [
      'Dev Full Stack,  3 anos!',
      '  Técnico em Informática\n',
      'Pós-Graduação\tem   Ciência de Dados',
      '',
    ];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });
});
