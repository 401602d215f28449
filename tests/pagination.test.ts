import { describe, it, expect } from '@jest/globals';
import { buildPagination, pageWindow } from '../src/pagination';

describe('pageWindow', () => {
  it('computes the offset of a page', () => {
    expect(pageWindow(3, 5)).toEqual({ page: 3, size: 5, offset: 10 });
  });

  it.each([
    [0, 0],
    [-2, -5],
    [Number.NaN, Number.POSITIVE_INFINITY],
  ])('clamps page %p and size %p to the first page of 10', (page, size) => {
    expect(pageWindow(page, size)).toEqual({ page: 1, size: 10, offset: 0 });
  });

  it('truncates fractions', () => {
    expect(pageWindow(2.7, 4.2)).toEqual({ page: 2, size: 4, offset: 4 });
  });
});

describe('buildPagination', () => {
  it('links a middle page both ways', () => {
    expect(buildPagination(2, 10, 25)).toEqual({
      currentPage: 2,
      perPage: 10,
      total: 25,
      totalPages: 3,
      nextPage: 3,
      previousPage: 1,
    });
  });

  it('counts one page when there is nothing', () => {
    expect(buildPagination(1, 10, 0)).toMatchObject({ totalPages: 1, nextPage: null, previousPage: null });
  });

  it('has no next page on an exact last page', () => {
    expect(buildPagination(2, 5, 10)).toMatchObject({ totalPages: 2, nextPage: null, previousPage: 1 });
  });
});
