// src/models/search.model.ts
import { z } from 'zod';
import { idField, numberField, optionalIdField, optionalInt, optionalString, stringField } from './fields';

export type BoundingBoxes = Record<string, unknown> | unknown[];

export interface SearchResult {
    readonly chunkId: string;
    readonly fileId: string;
    readonly fileName: string;
    readonly content: string;
    /** Similarity score, higher is closer. */
    readonly score: number;
    readonly chunkIndex: number;
    readonly pageNumber?: number;
    readonly startPage?: number;
    readonly endPage?: number;
    readonly projectId?: string;
    readonly referenceId?: string;
    readonly category?: string;
    readonly documentType?: string;
    readonly boundingBoxes?: BoundingBoxes;
}

export interface ColumnInfo {
    readonly name: string;
    /** Database type name, e.g. varchar or integer. */
    readonly type: string;
    readonly description?: string;
}

export interface StructuredResult {
    readonly columns: readonly ColumnInfo[];
    readonly rows: readonly Record<string, unknown>[];
    readonly hasData: boolean;
}

/** Which backend path answered the query. */
export interface SearchRouting {
    readonly route: 'semantic' | 'structured' | 'hybrid' | (string & {});
    readonly reasoning?: string;
    readonly connectorId?: string;
    readonly connectorName?: string;
    readonly sqlGenerated?: string;
    readonly sqlExplanation?: string;
}

export interface ResultsContainer {
    readonly semantic: readonly SearchResult[];
    readonly structured?: StructuredResult;
}

export class SearchResults implements Iterable<SearchResult> {
    readonly query: string;
    readonly results: ResultsContainer;
    readonly routing?: SearchRouting;
    readonly totalResults: number;
    readonly searchTimeMs: number;

    constructor(init: {
        query: string;
        results: ResultsContainer;
        routing?: SearchRouting;
        totalResults: number;
        searchTimeMs: number;
    }) {
        this.query = init.query;
        this.results = init.results;
        this.routing = init.routing;
        this.totalResults = init.totalResults;
        this.searchTimeMs = init.searchTimeMs;
    }

    get semantic(): readonly SearchResult[] {
        return this.results.semantic;
    }

    get structured(): StructuredResult | undefined {
        return this.results.structured;
    }

    /** Number of semantic results. */
    get length(): number {
        return this.results.semantic.length;
    }

    at(index: number): SearchResult | undefined {
        return this.results.semantic.at(index);
    }

    get hasDocuments(): boolean {
        return this.results.semantic.length > 0;
    }

    get hasStructured(): boolean {
        return this.results.structured?.hasData ?? false;
    }

    [Symbol.iterator](): Iterator<SearchResult> {
        return this.results.semantic[Symbol.iterator]();
    }
}

// --- Response parsing ---

const boundingBoxesField = z
    .union([z.record(z.unknown()), z.array(z.unknown())])
    .nullish()
    .transform((value) => value ?? undefined);

export const searchResultSchema = z
    .object({
        chunk_id: idField,
        file_id: idField,
        file_name: stringField(),
        content: stringField(),
        score: numberField(0),
        chunk_index: numberField(0),
        page_number: optionalInt,
        start_page: optionalInt,
        end_page: optionalInt,
        project_id: optionalIdField,
        reference_id: optionalString,
        category: optionalString,
        document_type: optionalString,
        bounding_boxes: boundingBoxesField,
    })
    .transform((raw): SearchResult => ({
        chunkId: raw.chunk_id,
        fileId: raw.file_id,
        fileName: raw.file_name,
        content: raw.content,
        score: raw.score,
        chunkIndex: raw.chunk_index,
        pageNumber: raw.page_number,
        startPage: raw.start_page,
        endPage: raw.end_page,
        projectId: raw.project_id,
        referenceId: raw.reference_id,
        category: raw.category,
        documentType: raw.document_type,
        boundingBoxes: raw.bounding_boxes,
    }));

const columnInfoSchema = z.object({
    name: z.string(),
    type: z.string(),
    description: optionalString,
});

const structuredResultSchema = z
    .object({
        columns: z.array(columnInfoSchema).nullish().transform((value) => value ?? []),
        rows: z.array(z.record(z.unknown())).nullish().transform((value) => value ?? []),
    })
    .transform((raw): StructuredResult => ({
        columns: raw.columns,
        rows: raw.rows,
        hasData: raw.rows.length > 0,
    }));

const searchRoutingSchema = z
    .object({
        route: z.string(),
        reasoning: optionalString,
        connector_id: optionalIdField,
        connector_name: optionalString,
        sql_generated: optionalString,
        sql_explanation: optionalString,
    })
    .transform((raw): SearchRouting => ({
        route: raw.route,
        reasoning: raw.reasoning,
        connectorId: raw.connector_id,
        connectorName: raw.connector_name,
        sqlGenerated: raw.sql_generated,
        sqlExplanation: raw.sql_explanation,
    }));

const semanticListSchema = z.array(searchResultSchema);

// Older deployments return `results` as a bare list of chunks.
const resultsContainerSchema = z
    .union([
        semanticListSchema.transform((semantic): ResultsContainer => ({ semantic })),
        z
            .object({
                semantic: semanticListSchema.nullish().transform((value) => value ?? []),
                structured: structuredResultSchema.nullish().transform((value) => value ?? undefined),
            })
            .transform((raw): ResultsContainer => ({ semantic: raw.semantic, structured: raw.structured })),
    ])
    .nullish()
    .transform((value): ResultsContainer => value ?? { semantic: [] });

export const searchResponseSchema = z.object({
    query: optionalString,
    results: resultsContainerSchema,
    routing: searchRoutingSchema.nullish().transform((value) => value ?? undefined),
    total_results: z.number().int().nullish(),
    search_time_ms: z.number().nullish(),
});

export type SearchResponse = z.infer<typeof searchResponseSchema>;

/** Builds the result container, falling back to request values for anything the server left out. */
export function toSearchResults(response: SearchResponse, requestQuery: string): SearchResults {
    return new SearchResults({
        query: response.query ?? requestQuery,
        results: response.results,
        routing: response.routing,
        totalResults: response.total_results ?? response.results.semantic.length,
        searchTimeMs: response.search_time_ms ?? 0,
    });
}
