// src/models/project.model.ts
import { z } from 'zod';
import { idField, optionalIdField, optionalString, stringField, timestampField } from './fields';

export interface Project {
    readonly id: string;
    readonly name: string;
    readonly organizationId: string;
    readonly isActive: boolean;
    readonly createdAt?: Date;
    readonly updatedAt?: Date;
}

export const projectResponseSchema = z
    .object({
        id: idField,
        name: stringField(),
        organization_id: idField,
        is_active: z.boolean().nullish().transform((value) => value ?? true),
        created_at: timestampField,
        updated_at: timestampField,
    })
    .transform((raw): Project => ({
        id: raw.id,
        name: raw.name,
        organizationId: raw.organization_id,
        isActive: raw.is_active,
        createdAt: raw.created_at,
        updatedAt: raw.updated_at,
    }));

/** What the API key resolves to. Only the organization is guaranteed. */
export interface ApiKeyContext {
    readonly organizationId: string;
    readonly organizationName?: string;
    readonly projectId?: string;
    readonly environmentSlug?: string;
}

export const apiKeyContextSchema = z
    .object({
        organization_id: z.union([z.string().min(1), z.number()]).transform(String),
        organization_name: optionalString,
        project_id: optionalIdField,
        environment_slug: optionalString,
    })
    .transform((raw): ApiKeyContext => ({
        organizationId: raw.organization_id,
        organizationName: raw.organization_name,
        projectId: raw.project_id,
        environmentSlug: raw.environment_slug,
    }));
