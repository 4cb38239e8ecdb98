import {Server} from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    type CallToolRequest,
} from "@modelcontextprotocol/sdk/types.js";
import {zodToJsonSchema} from "zod-to-json-schema";

import {
    ReadOdtMetadataArgsSchema,
    WriteOdtMetadataArgsSchema,
    ListMetadataFieldsArgsSchema,
} from './tools/schemas.js';
import {
    handleReadOdtMetadata,
    handleWriteOdtMetadata,
    handleListMetadataFields,
} from './handlers/odt-handlers.js';
import {ServerResult} from './types.js';
import {createErrorResponse} from './error-handlers.js';
import {VERSION} from './version.js';
import { logToStderr } from './utils/logger.js';

const PATH_GUIDANCE = `Use absolute paths. Relative paths are resolved against the server's working directory, which is rarely what the user expects.`;

export const server = new Server(
    {
        name: "odt-meta",
        version: VERSION,
    },
    {
        capabilities: {
            tools: {},
        },
    },
);

export const TOOLS = [
    {
        name: "read_odt_metadata",
        description: `
            Read the metadata of an OpenDocument text file (.odt).

            Returns title, description, subject, keywords, author, creation date
            (dd/MM/yyyy HH:mm), document statistics (tables, images, pages,
            paragraphs, words, characters, non-whitespace characters) and
            hyperlink targets. Multi-valued fields are joined with ", ".

            ${PATH_GUIDANCE}`,
        inputSchema: zodToJsonSchema(ReadOdtMetadataArgsSchema),
        annotations: {
            title: "Read ODT Metadata",
            readOnlyHint: true,
        },
    },
    {
        name: "write_odt_metadata",
        description: `
            Change metadata fields of an OpenDocument text file (.odt) and repack it.

            Writable fields: title, description, subject, keywords, author.
            Omitted or null fields are left untouched; an empty string clears a field.
            keywords is comma-separated and replaces every existing keyword.
            Statistics, creation date and hyperlinks are read-only.

            The file is edited in place unless outputPath is given.

            ${PATH_GUIDANCE}`,
        inputSchema: zodToJsonSchema(WriteOdtMetadataArgsSchema),
        annotations: {
            title: "Write ODT Metadata",
            readOnlyHint: false,
            destructiveHint: true,
            openWorldHint: false,
        },
    },
    {
        name: "list_metadata_fields",
        description: `
            List every supported metadata field with its XML element, attribute,
            multiplicity and whether it can be written.`,
        inputSchema: zodToJsonSchema(ListMetadataFieldsArgsSchema),
        annotations: {
            title: "List Metadata Fields",
            readOnlyHint: true,
        },
    },
];

server.setRequestHandler(ListToolsRequestSchema, async () => {
    logToStderr('debug', `Returning ${TOOLS.length} tools`);
    return {
        tools: TOOLS,
    };
});

/** Route one tool call to its handler. */
export async function callTool(name: string, args: unknown): Promise<ServerResult> {
    switch (name) {
        case "read_odt_metadata":
            return handleReadOdtMetadata(args);
        case "write_odt_metadata":
            return handleWriteOdtMetadata(args);
        case "list_metadata_fields":
            return handleListMetadataFields(args);
        default:
            return createErrorResponse(`Unknown tool: ${name}`);
    }
}

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest): Promise<ServerResult> => {
    const {name, arguments: args} = request.params;
    const startTime = Date.now();

    const result = await callTool(name, args);

    logToStderr('debug', `${name} finished in ${Date.now() - startTime}ms${result.isError ? ' with error' : ''}`);
    return result;
});
