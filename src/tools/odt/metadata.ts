/**
 * ODT Metadata Field Mapper
 *
 * Maps the fixed field schema onto a ParsedDocument's tree: plain text
 * elements, attributes on meta:document-statistic, multi-valued keyword
 * elements and hyperlink targets.
 *
 * The mapper caches nothing: every call re-reads the tree, so mutations made
 * by other code between calls are visible. It mutates the tree in place
 * without locking; do not share one between concurrent callers.
 *
 * @module odt/metadata
 */

import { OdtError, OdtErrorCode } from './errors.js';
import { META_TAGS, VALUE_SEPARATOR, WRITE_DELIMITER } from './constants.js';
import { detach, getElements, getFirstElement } from './dom.js';
import { FIELD_DESCRIPTORS, WRITABLE_FIELD_NAMES } from './fields.js';
import { formatCreationDate } from './utils/dates.js';
import type { ParsedDocument } from './parsed-document.js';
import type {
    FieldDescriptor,
    MetadataChanges,
    MetadataFieldName,
    OdtMetadata,
    WritableFieldName,
} from './types.js';

/**
 * Split a comma-joined value into tokens. Tokens keep their surrounding
 * whitespace; trailing empty tokens are dropped once the input has a comma
 * at all, so "a,b," gives two tokens and "" gives one empty token.
 */
export function splitMultiValue(value: string): string[] {
    if (!value.includes(WRITE_DELIMITER)) return [value];
    const tokens = value.split(WRITE_DELIMITER);
    while (tokens.length > 0 && tokens[tokens.length - 1] === '') {
        tokens.pop();
    }
    return tokens;
}

export class MetadataMapper {
    constructor(private readonly document: ParsedDocument) {}

    private get tree(): Document {
        return this.document.getTree();
    }

    /** The office:meta container; writers never create it. */
    private requireContainer(tag: string): Element {
        const container = getFirstElement(this.tree, META_TAGS.CONTAINER);
        if (!container) {
            throw new OdtError(
                `Cannot write <${tag}>: document has no <${META_TAGS.CONTAINER}> element`,
                OdtErrorCode.STRUCTURAL_ERROR,
                { tag },
            );
        }
        return container;
    }

    private appendToContainer(container: Element, tag: string, text: string): Element {
        const element = this.tree.createElement(tag);
        element.textContent = text;
        container.appendChild(element);
        return element;
    }

    // ═══════════════════════════════════════════════════════════════════
    // Generic primitives
    // ═══════════════════════════════════════════════════════════════════

    /** Text content of every `tag` element, joined by ", ". */
    readSingle(tag: string): string {
        return getElements(this.tree, tag)
            .map((element) => element.textContent ?? '')
            .join(VALUE_SEPARATOR);
    }

    /**
     * Values of `attribute` on every `tag` element that has it, joined by ", ".
     * Elements without the attribute are skipped entirely, so three matches
     * with two attributes give two values and one separator.
     */
    readAttribute(tag: string, attribute: string): string {
        return getElements(this.tree, tag)
            .filter((element) => element.hasAttribute(attribute))
            .map((element) => element.getAttribute(attribute) ?? '')
            .join(VALUE_SEPARATOR);
    }

    /**
     * Overwrite the first `tag` element's text, or append a new one to the
     * container. `null`/`undefined` leaves the tree untouched; '' is a write.
     */
    writeSingle(tag: string, value: string | null | undefined): this {
        if (value === null || value === undefined) return this;

        const existing = getFirstElement(this.tree, tag);
        if (existing) {
            existing.textContent = value;
            return this;
        }

        this.appendToContainer(this.requireContainer(tag), tag, value);
        return this;
    }

    /** Replace every `tag` element with one element per comma-separated token. */
    writeMultiValued(tag: string, value: string | null | undefined): this {
        if (value === null || value === undefined) return this;

        const container = this.requireContainer(tag);
        this.removeAll(tag);
        for (const token of splitMultiValue(value)) {
            this.appendToContainer(container, tag, token);
        }
        return this;
    }

    /** Detach every `tag` element. Calling it when none exist is a no-op. */
    removeAll(tag: string): this {
        for (let first = getFirstElement(this.tree, tag); first; first = getFirstElement(this.tree, tag)) {
            detach(first);
        }
        return this;
    }

    // ═══════════════════════════════════════════════════════════════════
    // Schema-driven access
    // ═══════════════════════════════════════════════════════════════════

    getField(name: MetadataFieldName): string {
        if (name === 'creationDate') return this.getCreationDate();
        const descriptor: FieldDescriptor = FIELD_DESCRIPTORS[name];
        return descriptor.attribute
            ? this.readAttribute(descriptor.tag, descriptor.attribute)
            : this.readSingle(descriptor.tag);
    }

    setField(name: MetadataFieldName, value: string | null | undefined): this {
        const descriptor: FieldDescriptor = FIELD_DESCRIPTORS[name];
        if (!descriptor.writable) {
            throw new OdtError(`Metadata field is read-only: ${name}`, OdtErrorCode.READ_ONLY_FIELD, { field: name });
        }
        return descriptor.multiplicity === 'multi'
            ? this.writeMultiValued(descriptor.tag, value)
            : this.writeSingle(descriptor.tag, value);
    }

    /** Snapshot of every field. */
    toRecord(): OdtMetadata {
        return {
            title: this.getTitle(),
            description: this.getDescription(),
            subject: this.getSubject(),
            keywords: this.getKeywords(),
            author: this.getAuthor(),
            creationDate: this.getCreationDate(),
            tableCount: this.getTableCount(),
            imageCount: this.getImageCount(),
            pageCount: this.getPageCount(),
            paragraphCount: this.getParagraphCount(),
            wordCount: this.getWordCount(),
            characterCount: this.getCharacterCount(),
            nonWhitespaceCharacterCount: this.getNonWhitespaceCharacterCount(),
            hyperlinks: this.getHyperlinks(),
        };
    }

    // ═══════════════════════════════════════════════════════════════════
    // Typed accessors
    // ═══════════════════════════════════════════════════════════════════

    getTitle(): string {
        return this.readSingle(META_TAGS.TITLE);
    }

    setTitle(title: string | null | undefined): this {
        return this.writeSingle(META_TAGS.TITLE, title);
    }

    getDescription(): string {
        return this.readSingle(META_TAGS.DESCRIPTION);
    }

    setDescription(description: string | null | undefined): this {
        return this.writeSingle(META_TAGS.DESCRIPTION, description);
    }

    getSubject(): string {
        return this.readSingle(META_TAGS.SUBJECT);
    }

    setSubject(subject: string | null | undefined): this {
        return this.writeSingle(META_TAGS.SUBJECT, subject);
    }

    getAuthor(): string {
        return this.readSingle(META_TAGS.AUTHOR);
    }

    setAuthor(author: string | null | undefined): this {
        return this.writeSingle(META_TAGS.AUTHOR, author);
    }

    getKeywords(): string {
        return this.readSingle(META_TAGS.KEYWORD);
    }

    /** `keywords` is comma-separated; each token becomes one meta:keyword. */
    setKeywords(keywords: string | null | undefined): this {
        return this.writeMultiValued(META_TAGS.KEYWORD, keywords);
    }

    /** `dd/MM/yyyy HH:mm` when the stored value is a local ISO date-time, else the raw text. */
    getCreationDate(): string {
        return formatCreationDate(this.readSingle(META_TAGS.CREATION_DATE));
    }

    getTableCount(): string {
        return this.getField('tableCount');
    }

    getImageCount(): string {
        return this.getField('imageCount');
    }

    getPageCount(): string {
        return this.getField('pageCount');
    }

    getParagraphCount(): string {
        return this.getField('paragraphCount');
    }

    getWordCount(): string {
        return this.getField('wordCount');
    }

    getCharacterCount(): string {
        return this.getField('characterCount');
    }

    getNonWhitespaceCharacterCount(): string {
        return this.getField('nonWhitespaceCharacterCount');
    }

    getHyperlinks(): string {
        return this.getField('hyperlinks');
    }

    /** Apply a change set in schema order; returns the fields that were written. */
    applyChanges(changes: MetadataChanges): WritableFieldName[] {
        const applied: WritableFieldName[] = [];
        for (const name of WRITABLE_FIELD_NAMES) {
            const value = changes[name];
            if (value === null || value === undefined) continue;
            this.setField(name, value);
            applied.push(name);
        }
        return applied;
    }
}
