import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors';
import { toApiFormat } from './filters.model';

describe('toApiFormat', () => {
  it('returns an empty map when nothing is set', () => {
    expect(toApiFormat({})).toEqual({});
  });

  it('uses snake_case keys for every field', () => {
    expect(
      toApiFormat({
        referenceId: 'HB-2024',
        referenceIds: ['HB-2023', 'HB-2024'],
        pageNumber: 3,
        pageNumbers: [1, 2],
        pageRange: { gte: 1, lte: 50 },
        category: 'policy',
        documentType: 'handbook',
      })
    ).toEqual({
      reference_id: 'HB-2024',
      reference_ids: ['HB-2023', 'HB-2024'],
      page_number: 3,
      page_numbers: [1, 2],
      page_range: { gte: 1, lte: 50 },
      category: 'policy',
      document_type: 'handbook',
    });
  });

  it('omits unset page range bounds', () => {
    expect(toApiFormat({ pageRange: { lte: 10 } })).toEqual({ page_range: { lte: 10 } });
  });

  it('drops empty strings and empty lists', () => {
    expect(toApiFormat({ referenceId: '', referenceIds: [], pageNumbers: [], category: '' })).toEqual({});
  });

  it('rejects page numbers below 1', () => {
    expect(() => toApiFormat({ pageRange: { gte: 0 } })).toThrow(ValidationError);
    expect(() => toApiFormat({ pageNumber: 0 })).toThrow(
      'Invalid metadata filter pageNumber: Page numbers start at 1'
    );
  });
});
