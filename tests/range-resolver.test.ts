import { describe, it, expect } from 'vitest';
import { resolveFiscalYears, resolveFullWindow, resolveRange } from '../src/collection/range-resolver';

describe('RangeResolver', () => {
  describe('resolveRange', () => {
    it('should return the full default window when nothing is stored', () => {
      const result = resolveRange(null, null, '2024-06-14');

      expect(result).toEqual({ kind: 'range', range: { from: '2023-06-15', to: '2024-06-14' } });
    });

    it('should clamp the window to the provider floor', () => {
      const result = resolveRange(null, '2024-01-02', '2024-06-14');

      expect(result).toEqual({ kind: 'range', range: { from: '2024-01-02', to: '2024-06-14' } });
    });

    it('should start the day after the last stored date', () => {
      const result = resolveRange('2024-06-10', '1995-05-02', '2024-06-14');

      expect(result).toEqual({ kind: 'range', range: { from: '2024-06-11', to: '2024-06-14' } });
    });

    it('should ignore the provider floor once history exists', () => {
      const result = resolveRange('2024-06-10', '2024-06-12', '2024-06-14');

      expect(result).toEqual({ kind: 'range', range: { from: '2024-06-11', to: '2024-06-14' } });
    });

    it('should return a single day when one day is missing', () => {
      const result = resolveRange('2024-06-13', null, '2024-06-14');

      expect(result).toEqual({ kind: 'range', range: { from: '2024-06-14', to: '2024-06-14' } });
    });

    it('should report already current when the last date is today', () => {
      expect(resolveRange('2024-06-14', null, '2024-06-14')).toEqual({ kind: 'already_current', lastDate: '2024-06-14' });
    });

    it('should report already current when the last date is ahead of today', () => {
      expect(resolveRange('2024-06-15', null, '2024-06-14')).toEqual({ kind: 'already_current', lastDate: '2024-06-15' });
    });

    it('should honour a custom window', () => {
      const result = resolveRange(null, null, '2024-06-14', 30);

      expect(result).toEqual({ kind: 'range', range: { from: '2024-05-15', to: '2024-06-14' } });
    });
  });

  describe('resolveFullWindow', () => {
    it('should use the later of window start and provider floor', () => {
      expect(resolveFullWindow('2000-01-03', '2024-06-14', 10)).toEqual({ from: '2024-06-04', to: '2024-06-14' });
      expect(resolveFullWindow('2024-06-10', '2024-06-14', 10)).toEqual({ from: '2024-06-10', to: '2024-06-14' });
    });
  });

  describe('resolveFiscalYears', () => {
    it('should list every year from the start year when none is stored', () => {
      expect(resolveFiscalYears(null, 2020, 2023)).toEqual({ kind: 'years', years: [2020, 2021, 2022, 2023] });
    });

    it('should continue after the last stored year', () => {
      expect(resolveFiscalYears(2021, 2020, 2023)).toEqual({ kind: 'years', years: [2022, 2023] });
    });

    it('should not reach back before the start year', () => {
      expect(resolveFiscalYears(2010, 2020, 2021)).toEqual({ kind: 'years', years: [2020, 2021] });
    });

    it('should report already current when the last year is the end year', () => {
      expect(resolveFiscalYears(2023, 2020, 2023)).toEqual({ kind: 'already_current', lastYear: 2023 });
    });

    it('should return no years when the start year is past the end year', () => {
      expect(resolveFiscalYears(null, 2024, 2023)).toEqual({ kind: 'years', years: [] });
    });
  });
});
