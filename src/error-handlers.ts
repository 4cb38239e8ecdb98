import { ServerResult } from './types.js';
import { errorMessage, isOdtError } from './tools/odt/errors.js';
import { logger } from './utils/logger.js';

/**
 * Creates a standard error response for tools
 * @param message The error message
 * @returns A ServerResult with the error message
 */
export function createErrorResponse(message: string): ServerResult {
    return {
        content: [{ type: "text", text: `Error: ${message}` }],
        isError: true,
    };
}

/**
 * Turn any thrown value into a tool error result.
 * OdtErrors carry their code so clients can tell failure kinds apart.
 */
export function errorToResponse(toolName: string, error: unknown): ServerResult {
    if (isOdtError(error)) {
        logger.error(`${toolName} failed [${error.code}]: ${error.message}`);
        logger.debug(`${toolName} error detail: ${JSON.stringify(error)}`);
        return createErrorResponse(`[${error.code}] ${error.message}`);
    }
    logger.error(`${toolName} failed: ${errorMessage(error)}`);
    return createErrorResponse(errorMessage(error));
}
