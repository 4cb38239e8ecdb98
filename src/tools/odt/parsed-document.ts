/**
 * ParsedDocument: the single owner of one mutable XML tree.
 *
 * A ParsedDocument is only ever constructed from a successful parse, so a
 * caller holding one always holds a usable tree. Read and parse failures
 * surface as OdtError (IO_ERROR / PARSE_ERROR) from the factory methods.
 *
 * @module odt/parsed-document
 */

import fs from 'fs/promises';
import { OdtError, OdtErrorCode, errorMessage } from './errors.js';
import { parseXml, serializeXml } from './dom.js';

export class ParsedDocument {
    private constructor(
        private tree: Document,
        public readonly sourcePath?: string,
    ) {}

    /** Read and parse an XML file. */
    static async load(filePath: string): Promise<ParsedDocument> {
        let xml: string;
        try {
            xml = await fs.readFile(filePath, 'utf8');
        } catch (error) {
            throw new OdtError(`Cannot read XML file: ${errorMessage(error)}`, OdtErrorCode.IO_ERROR, { filePath });
        }
        return ParsedDocument.fromString(xml, filePath);
    }

    static fromString(xml: string, sourcePath?: string): ParsedDocument {
        try {
            return new ParsedDocument(parseXml(xml, sourcePath), sourcePath);
        } catch (error) {
            if (error instanceof OdtError) throw error;
            throw new OdtError(`Malformed XML: ${errorMessage(error)}`, OdtErrorCode.PARSE_ERROR, { sourcePath });
        }
    }

    getTree(): Document {
        return this.tree;
    }

    replaceTree(tree: Document): void {
        this.tree = tree;
    }

    serialize(): string {
        return serializeXml(this.tree);
    }

    /** Write the current tree back to disk, by default where it came from. */
    async save(filePath: string | undefined = this.sourcePath): Promise<string> {
        if (!filePath) {
            throw new OdtError('No target path: document was not loaded from a file', OdtErrorCode.INVALID_PATH);
        }
        try {
            await fs.writeFile(filePath, this.serialize(), 'utf8');
        } catch (error) {
            throw new OdtError(`Cannot write XML file: ${errorMessage(error)}`, OdtErrorCode.IO_ERROR, { filePath });
        }
        return filePath;
    }
}
