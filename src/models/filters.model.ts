// src/models/filters.model.ts
import { z } from 'zod';
import { ValidationError } from '../errors';

const pageNumber = z.number().int().min(1, 'Page numbers start at 1');

export const pageRangeSchema = z.object({
    gte: pageNumber.optional(),
    lte: pageNumber.optional(),
});

export const metadataFiltersSchema = z.object({
    /** Client-provided file reference id. */
    referenceId: z.string().optional(),
    /** Several reference ids, matched with OR. */
    referenceIds: z.array(z.string()).optional(),
    pageNumber: pageNumber.optional(),
    /** Several page numbers, matched with OR. */
    pageNumbers: z.array(pageNumber).optional(),
    /** Inclusive on both ends. */
    pageRange: pageRangeSchema.optional(),
    category: z.string().optional(),
    documentType: z.string().optional(),
});

export type PageRange = z.infer<typeof pageRangeSchema>;
export type MetadataFilters = z.infer<typeof metadataFiltersSchema>;

export type MetadataFiltersPayload = {
    reference_id?: string;
    reference_ids?: string[];
    page_number?: number;
    page_numbers?: number[];
    page_range?: { gte?: number; lte?: number };
    category?: string;
    document_type?: string;
};

/**
 * Validates the filters and converts them to the sparse snake_case map the
 * search endpoint expects. Empty strings and empty lists are left out.
 */
export function toApiFormat(filters: MetadataFilters): MetadataFiltersPayload {
    const parsed = metadataFiltersSchema.safeParse(filters);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ValidationError(`Invalid metadata filter ${issue.path.join('.')}: ${issue.message}`);
    }
    const f = parsed.data;
    const result: MetadataFiltersPayload = {};

    if (f.referenceId) result.reference_id = f.referenceId;
    if (f.referenceIds && f.referenceIds.length > 0) result.reference_ids = f.referenceIds;
    if (f.pageNumber !== undefined) result.page_number = f.pageNumber;
    if (f.pageNumbers && f.pageNumbers.length > 0) result.page_numbers = f.pageNumbers;
    if (f.pageRange) {
        const range: { gte?: number; lte?: number } = {};
        if (f.pageRange.gte !== undefined) range.gte = f.pageRange.gte;
        if (f.pageRange.lte !== undefined) range.lte = f.pageRange.lte;
        result.page_range = range;
    }
    if (f.category) result.category = f.category;
    if (f.documentType) result.document_type = f.documentType;

    return result;
}
