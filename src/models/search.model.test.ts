import { describe, it, expect } from 'vitest';
import { SearchResults, searchResponseSchema, searchResultSchema, toSearchResults } from './search.model';

const chunk = (id: string, score: number) => ({
  chunk_id: id,
  file_id: 'file-1',
  file_name: 'handbook.pdf',
  content: `content ${id}`,
  score,
});

describe('searchResultSchema', () => {
  it('applies permissive defaults', () => {
    expect(searchResultSchema.parse({ chunk_id: 5, file_id: 'f' })).toEqual({
      chunkId: '5',
      fileId: 'f',
      fileName: '',
      content: '',
      score: 0,
      chunkIndex: 0,
      pageNumber: undefined,
      startPage: undefined,
      endPage: undefined,
      projectId: undefined,
      referenceId: undefined,
      category: undefined,
      documentType: undefined,
      boundingBoxes: undefined,
    });
  });

  it('passes optional fields through', () => {
    const result = searchResultSchema.parse({
      ...chunk('c1', 0.91),
      chunk_index: 4,
      page_number: 2,
      start_page: 2,
      end_page: 3,
      project_id: 17,
      reference_id: 'HB-2024',
      category: 'policy',
      document_type: 'handbook',
      bounding_boxes: { '2': [[0, 0, 10, 10]] },
    });

    expect(result.projectId).toBe('17');
    expect(result.chunkIndex).toBe(4);
    expect(result.endPage).toBe(3);
    expect(result.boundingBoxes).toEqual({ '2': [[0, 0, 10, 10]] });
  });
});

describe('toSearchResults', () => {
  it('reads semantic and structured results side by side', () => {
    const response = searchResponseSchema.parse({
      query: 'revenue by region',
      results: {
        semantic: [chunk('c1', 0.9)],
        structured: {
          columns: [{ name: 'region', type: 'varchar' }, { name: 'total', type: 'integer', description: 'USD' }],
          rows: [{ region: 'EMEA', total: 120 }],
        },
      },
      routing: { route: 'hybrid', reasoning: 'mixed question', sql_generated: 'SELECT 1' },
      total_results: 2,
      search_time_ms: 88.5,
    });
    const results = toSearchResults(response, 'ignored');

    expect(results.query).toBe('revenue by region');
    expect(results.length).toBe(1);
    expect(results.hasDocuments).toBe(true);
    expect(results.hasStructured).toBe(true);
    expect(results.structured?.columns[1]).toEqual({ name: 'total', type: 'integer', description: 'USD' });
    expect(results.structured?.rows).toEqual([{ region: 'EMEA', total: 120 }]);
    expect(results.routing?.route).toBe('hybrid');
    expect(results.routing?.sqlGenerated).toBe('SELECT 1');
    expect(results.totalResults).toBe(2);
    expect(results.searchTimeMs).toBe(88.5);
  });

  it('accepts a bare list of chunks and fills in totals', () => {
    const response = searchResponseSchema.parse({ results: [chunk('c1', 0.9), chunk('c2', 0.8)] });
    const results = toSearchResults(response, 'leave policy');

    expect(results.query).toBe('leave policy');
    expect(results.totalResults).toBe(2);
    expect(results.searchTimeMs).toBe(0);
    expect(results.structured).toBeUndefined();
    expect(results.hasStructured).toBe(false);
  });

  it('treats a missing results field as empty', () => {
    const results = toSearchResults(searchResponseSchema.parse({}), 'q');
    expect(results.length).toBe(0);
    expect(results.hasDocuments).toBe(false);
    expect(results.totalResults).toBe(0);
  });

  it('reports a structured result without rows as having no data', () => {
    const response = searchResponseSchema.parse({ results: { semantic: [], structured: { columns: [] } } });
    const results = toSearchResults(response, 'q');
    expect(results.structured?.hasData).toBe(false);
    expect(results.hasStructured).toBe(false);
  });
});

describe('SearchResults', () => {
  const results = new SearchResults({
    query: 'q',
    results: {
      semantic: [
        searchResultSchema.parse(chunk('a', 0.9)),
        searchResultSchema.parse(chunk('b', 0.8)),
      ],
    },
    totalResults: 2,
    searchTimeMs: 10,
  });

  it('iterates over semantic results in order', () => {
    expect([...results].map((r) => r.chunkId)).toEqual(['a', 'b']);
  });

  it('indexes into semantic results', () => {
    expect(results.at(0)?.content).toBe('content a');
    expect(results.at(-1)?.chunkId).toBe('b');
    expect(results.at(5)).toBeUndefined();
    expect(results.semantic).toHaveLength(2);
  });
});
