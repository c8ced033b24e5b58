// src/models/file.model.ts
import { z } from 'zod';
import { idField, numberField, optionalString, stringField, timestampField } from './fields';

/** Pipeline stages in the order the service moves a file through them. */
export const FILE_STATUSES = [
    'uploading',
    'uploaded',
    'upload_failed',
    'conversion_started',
    'conversion_complete',
    'conversion_failed',
    'parsing_started',
    'parsing_complete',
    'parsing_failed',
    'chunking_started',
    'chunking_complete',
    'chunking_failed',
    'embedding_started',
    'embedding_complete',
    'embedding_failed',
    'ready',
] as const;

export type FileStatus = (typeof FILE_STATUSES)[number];

export const isFileStatus = (value: string): value is FileStatus =>
    (FILE_STATUSES as readonly string[]).includes(value);

export const isFailed = (status: FileStatus): boolean => status.endsWith('_failed');

export const isProcessing = (status: FileStatus): boolean => !isFailed(status) && status !== 'ready';

export const isTerminal = (status: FileStatus): boolean => !isProcessing(status);

export interface FileRecord {
    readonly id: string;
    readonly name: string;
    readonly originalFilename: string;
    /** Size in bytes. */
    readonly size: number;
    readonly mimeType: string;
    readonly projectId: string;
    readonly status: FileStatus;
    readonly referenceId?: string;
    readonly errorMessage?: string;
    readonly totalChunks: number;
    readonly totalEmbeddings: number;
    readonly createdAt?: Date;
    readonly updatedAt?: Date;
}

// Confirm and status responses may leave out any of these fields.
export const fileResponseSchema = z
    .object({
        id: idField,
        name: stringField(),
        original_filename: stringField(),
        size: numberField(0),
        mime_type: stringField(),
        project_id: idField,
        status: z.enum(FILE_STATUSES).nullish().transform((value) => value ?? 'uploading'),
        reference_id: optionalString,
        error_message: optionalString,
        total_chunks: numberField(0),
        total_embeddings: numberField(0),
        created_at: timestampField,
        updated_at: timestampField,
    })
    .transform((raw): FileRecord => ({
        id: raw.id,
        name: raw.name,
        originalFilename: raw.original_filename,
        size: raw.size,
        mimeType: raw.mime_type,
        projectId: raw.project_id,
        status: raw.status,
        referenceId: raw.reference_id,
        errorMessage: raw.error_message,
        totalChunks: raw.total_chunks,
        totalEmbeddings: raw.total_embeddings,
        createdAt: raw.created_at,
        updatedAt: raw.updated_at,
    }));

export const uploadInitResponseSchema = z.object({
    file_id: z.union([z.string(), z.number()]).transform(String),
    upload_url: z.string().url(),
    expires_in: z.number().optional(),
});

export type UploadInitResponse = z.infer<typeof uploadInitResponseSchema>;
