import {
    readOdtMetadata,
    writeOdtMetadata,
    FIELD_DESCRIPTORS,
    METADATA_FIELD_NAMES,
    type FieldDescriptor,
} from '../tools/odt/index.js';

import {ServerResult} from '../types.js';
import {createErrorResponse, errorToResponse} from '../error-handlers.js';

import {
    ReadOdtMetadataArgsSchema,
    WriteOdtMetadataArgsSchema,
    ListMetadataFieldsArgsSchema,
} from '../tools/schemas.js';

function jsonResponse(value: unknown): ServerResult {
    return {
        content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
    };
}

function describeIssues(issues: { path: (string | number)[]; message: string }[]): string {
    return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Handle read_odt_metadata command
 */
export async function handleReadOdtMetadata(args: unknown): Promise<ServerResult> {
    if (args === null || args === undefined) {
        return createErrorResponse('No arguments provided for read_odt_metadata command');
    }
    const parsed = ReadOdtMetadataArgsSchema.safeParse(args);
    if (!parsed.success) {
        return createErrorResponse(`Invalid arguments for read_odt_metadata: ${describeIssues(parsed.error.issues)}`);
    }

    try {
        return jsonResponse(await readOdtMetadata(parsed.data.path));
    } catch (error) {
        return errorToResponse('read_odt_metadata', error);
    }
}

/**
 * Handle write_odt_metadata command
 */
export async function handleWriteOdtMetadata(args: unknown): Promise<ServerResult> {
    if (args === null || args === undefined) {
        return createErrorResponse('No arguments provided for write_odt_metadata command');
    }
    const parsed = WriteOdtMetadataArgsSchema.safeParse(args);
    if (!parsed.success) {
        return createErrorResponse(`Invalid arguments for write_odt_metadata: ${describeIssues(parsed.error.issues)}`);
    }

    const { path, outputPath, metadata } = parsed.data;
    try {
        return jsonResponse(await writeOdtMetadata(path, metadata, { outputPath }));
    } catch (error) {
        return errorToResponse('write_odt_metadata', error);
    }
}

/**
 * Handle list_metadata_fields command
 */
export async function handleListMetadataFields(args: unknown): Promise<ServerResult> {
    const parsed = ListMetadataFieldsArgsSchema.safeParse(args ?? {});
    if (!parsed.success) {
        return createErrorResponse(`Invalid arguments for list_metadata_fields: ${describeIssues(parsed.error.issues)}`);
    }

    const fields = METADATA_FIELD_NAMES.map((name) => {
        const descriptor: FieldDescriptor = FIELD_DESCRIPTORS[name];
        return {
            name,
            label: descriptor.label,
            tag: descriptor.tag,
            attribute: descriptor.attribute ?? null,
            multiplicity: descriptor.multiplicity,
            writable: descriptor.writable,
        };
    });
    return jsonResponse(fields);
}
