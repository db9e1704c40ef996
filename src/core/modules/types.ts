import path from 'path';
import { z } from 'zod';

// Missing or null fields decode to '', like any other zero value
const textField = z.string().nullish().transform((value) => value ?? '');

/**
 * Remote descriptor of a scraping module.
 * Fields beyond the three the registry reads are kept verbatim.
 */
export const ModuleMetadataSchema = z.object({
    sourceName: textField,
    scriptURL: textField,
    version: textField,
}).passthrough();

export type ModuleMetadata = z.infer<typeof ModuleMetadataSchema>;

/**
 * One managed module as persisted in modules.json.
 */
export const ModuleRecordSchema = z.object({
    /** UUID handed out to callers */
    id: z.string().uuid(),

    /** Last metadata document fetched; replaced wholesale on refresh */
    metadata: ModuleMetadataSchema,

    /** Script file name inside the storage directory */
    localPath: z.string().min(1).refine(
        (name) => path.basename(name) === name && name !== '.' && name !== '..',
        { message: 'localPath must be a plain file name' }
    ),

    /** Where the metadata came from; unique across the registry */
    metadataURL: z.string(),

    /** Owned by consumers outside the registry */
    isActive: z.boolean().default(false),
});

export type ModuleRecord = z.infer<typeof ModuleRecordSchema>;

/**
 * The whole modules.json file. Ids and metadata URLs are unique keys,
 * so a file that repeats either is rejected.
 */
export const ModuleRecordListSchema = z.array(ModuleRecordSchema).superRefine((records, ctx) => {
    const seenIds = new Set<string>();
    const seenUrls = new Set<string>();
    records.forEach((record, index) => {
        if (seenIds.has(record.id)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index, 'id'],
                message: `Duplicate module id ${record.id}`,
            });
        }
        if (seenUrls.has(record.metadataURL)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index, 'metadataURL'],
                message: `Duplicate metadata URL ${record.metadataURL}`,
            });
        }
        seenIds.add(record.id);
        seenUrls.add(record.metadataURL);
    });
});

export interface ModuleSummary {
    id: string;
    name: string;
}

export interface ModuleUpdate {
    id: string;
    sourceName: string;
    previousVersion: string;
    version: string;
}

export interface ModuleFailure {
    id: string;
    sourceName: string;
    reason: string;
}

/**
 * Outcome of one refresh cycle, one entry per record.
 */
export interface RefreshSummary {
    updated: ModuleUpdate[];
    unchanged: string[];
    failed: ModuleFailure[];
}
