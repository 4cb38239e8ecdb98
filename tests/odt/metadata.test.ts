import { describe, it, expect, beforeEach } from 'vitest';
import { MetadataMapper, splitMultiValue } from '../../src/tools/odt/metadata.js';
import { ParsedDocument } from '../../src/tools/odt/parsed-document.js';
import { OdtErrorCode } from '../../src/tools/odt/errors.js';
import { readFixture } from '../helpers.js';

const NS = [
    'xmlns:office="urn:oasis:names:tc:opendocument:xmlns:office:1.0"',
    'xmlns:meta="urn:oasis:names:tc:opendocument:xmlns:meta:1.0"',
    'xmlns:dc="http://purl.org/dc/elements/1.1/"',
    'xmlns:text="urn:oasis:names:tc:opendocument:xmlns:text:1.0"',
    'xmlns:xlink="http://www.w3.org/1999/xlink"',
].join(' ');

function metaDocument(inner: string): ParsedDocument {
    return ParsedDocument.fromString(`<office:document-meta ${NS}><office:meta>${inner}</office:meta></office:document-meta>`);
}

function texts(document: ParsedDocument, tag: string): string[] {
    const list = document.getTree().getElementsByTagName(tag);
    const out: string[] = [];
    for (let i = 0; i < list.length; i++) {
        out.push(list.item(i)?.textContent ?? '');
    }
    return out;
}

describe('MetadataMapper', () => {
    describe('reading the sample meta.xml', () => {
        let mapper: MetadataMapper;

        beforeEach(async () => {
            mapper = new MetadataMapper(ParsedDocument.fromString(await readFixture('meta.xml')));
        });

        it('should read text fields', () => {
            expect(mapper.getTitle()).toBe('Quarterly Report');
            expect(mapper.getSubject()).toBe('Finance');
            expect(mapper.getAuthor()).toBe('Ada Example');
        });

        it('should return an empty string for a field with no element', () => {
            expect(mapper.getDescription()).toBe('');
        });

        it('should join multi-valued keywords', () => {
            expect(mapper.getKeywords()).toBe('budget, forecast');
        });

        it('should read statistics attributes', () => {
            expect(mapper.getTableCount()).toBe('2');
            expect(mapper.getImageCount()).toBe('1');
            expect(mapper.getPageCount()).toBe('4');
            expect(mapper.getParagraphCount()).toBe('37');
            expect(mapper.getWordCount()).toBe('812');
            expect(mapper.getCharacterCount()).toBe('4920');
            expect(mapper.getNonWhitespaceCharacterCount()).toBe('4110');
        });

        it('should reformat the creation date', () => {
            expect(mapper.getCreationDate()).toBe('01/05/2023 10:00');
        });

        it('should snapshot every field', () => {
            expect(mapper.toRecord()).toEqual({
                title: 'Quarterly Report',
                description: '',
                subject: 'Finance',
                keywords: 'budget, forecast',
                author: 'Ada Example',
                creationDate: '01/05/2023 10:00',
                tableCount: '2',
                imageCount: '1',
                pageCount: '4',
                paragraphCount: '37',
                wordCount: '812',
                characterCount: '4920',
                nonWhitespaceCharacterCount: '4110',
                hyperlinks: '',
            });
        });
    });

    describe('readSingle', () => {
        it('should join duplicated single-valued elements', () => {
            const mapper = new MetadataMapper(metaDocument('<dc:title>A</dc:title><dc:title>B</dc:title>'));
            expect(mapper.readSingle('dc:title')).toBe('A, B');
        });

        it('should see changes made to the tree between calls', () => {
            const document = metaDocument('<dc:title>Before</dc:title>');
            const mapper = new MetadataMapper(document);
            expect(mapper.getTitle()).toBe('Before');

            const title = document.getTree().getElementsByTagName('dc:title').item(0);
            if (title) title.textContent = 'After';

            expect(mapper.getTitle()).toBe('After');
        });
    });

    describe('readAttribute', () => {
        it('should skip elements without the attribute, adding no separator for them', () => {
            const mapper = new MetadataMapper(metaDocument(
                '<text:a xlink:href="https://a.example/">one</text:a>' +
                '<text:a>two</text:a>' +
                '<text:a xlink:href="https://c.example/">three</text:a>',
            ));
            expect(mapper.getHyperlinks()).toBe('https://a.example/, https://c.example/');
        });

        it('should return an empty string when nothing matches', () => {
            const mapper = new MetadataMapper(metaDocument(''));
            expect(mapper.getWordCount()).toBe('');
        });
    });

    describe('writeSingle', () => {
        it('should overwrite an existing element in place', () => {
            const document = metaDocument('<dc:title>Old</dc:title>');
            new MetadataMapper(document).setTitle('New');
            expect(texts(document, 'dc:title')).toEqual(['New']);
        });

        it('should leave the document untouched for null and undefined', () => {
            const document = metaDocument('<dc:title>Keep</dc:title>');
            const before = document.serialize();
            const mapper = new MetadataMapper(document);

            mapper.writeSingle('dc:title', null);
            mapper.setTitle(undefined);

            expect(document.serialize()).toBe(before);
        });

        it('should treat an empty string as a real write', () => {
            const document = metaDocument('<dc:title>Gone</dc:title>');
            const mapper = new MetadataMapper(document).setTitle('');
            expect(mapper.getTitle()).toBe('');
            expect(texts(document, 'dc:title')).toEqual(['']);
        });

        it('should create exactly one element under office:meta when missing', () => {
            const document = metaDocument('<dc:title>T</dc:title>');
            new MetadataMapper(document).setDescription('Summary');

            const created = document.getTree().getElementsByTagName('dc:description');
            expect(created.length).toBe(1);
            expect(created.item(0)?.textContent).toBe('Summary');
            expect(created.item(0)?.parentNode?.nodeName).toBe('office:meta');
        });

        it('should only touch the first of several matches', () => {
            const document = metaDocument('<dc:title>A</dc:title><dc:title>B</dc:title>');
            new MetadataMapper(document).setTitle('C');
            expect(texts(document, 'dc:title')).toEqual(['C', 'B']);
        });

        it('should fail with STRUCTURAL_ERROR when there is no container to create under', () => {
            const mapper = new MetadataMapper(ParsedDocument.fromString(`<office:document-meta ${NS}/>`));
            expect(() => mapper.setAuthor('Someone')).toThrowError(
                expect.objectContaining({ code: OdtErrorCode.STRUCTURAL_ERROR }),
            );
        });

        it('should overwrite without needing the container', () => {
            const document = ParsedDocument.fromString(`<root ${NS}><dc:title>x</dc:title></root>`);
            new MetadataMapper(document).setTitle('y');
            expect(texts(document, 'dc:title')).toEqual(['y']);
        });
    });

    describe('writeMultiValued', () => {
        it('should round-trip a comma-separated list', () => {
            const mapper = new MetadataMapper(metaDocument(''));
            mapper.writeMultiValued('k', 'a,b,c');
            expect(mapper.readSingle('k')).toBe('a, b, c');
        });

        it('should keep whitespace around tokens', () => {
            const document = metaDocument('');
            new MetadataMapper(document).writeMultiValued('k', 'a, b,c');
            expect(texts(document, 'k')).toEqual(['a', ' b', 'c']);
        });

        it('should replace every existing keyword', () => {
            const document = metaDocument('<meta:keyword>old1</meta:keyword><dc:title>T</dc:title><meta:keyword>old2</meta:keyword>');
            new MetadataMapper(document).setKeywords('new');
            expect(texts(document, 'meta:keyword')).toEqual(['new']);
        });

        it('should do nothing for null', () => {
            const document = metaDocument('<meta:keyword>stay</meta:keyword>');
            const before = document.serialize();
            new MetadataMapper(document).setKeywords(null);
            expect(document.serialize()).toBe(before);
        });

        it('should write one empty element for an empty string', () => {
            const document = metaDocument('<meta:keyword>x</meta:keyword>');
            new MetadataMapper(document).setKeywords('');
            expect(texts(document, 'meta:keyword')).toEqual(['']);
        });

        it('should fail with STRUCTURAL_ERROR and keep existing keywords when the container is missing', () => {
            const document = ParsedDocument.fromString(`<root ${NS}><meta:keyword>kept</meta:keyword></root>`);
            const mapper = new MetadataMapper(document);

            expect(() => mapper.setKeywords('a,b')).toThrowError(
                expect.objectContaining({ code: OdtErrorCode.STRUCTURAL_ERROR }),
            );
            expect(texts(document, 'meta:keyword')).toEqual(['kept']);
        });
    });

    describe('splitMultiValue', () => {
        it('should drop trailing empty tokens', () => {
            expect(splitMultiValue('x,y,')).toEqual(['x', 'y']);
            expect(splitMultiValue(',,')).toEqual([]);
        });

        it('should keep inner empty tokens', () => {
            expect(splitMultiValue('x,,y')).toEqual(['x', '', 'y']);
        });

        it('should return the input when there is no comma', () => {
            expect(splitMultiValue('')).toEqual(['']);
            expect(splitMultiValue('solo')).toEqual(['solo']);
        });
    });

    describe('removeAll', () => {
        it('should be idempotent', () => {
            const document = metaDocument('<meta:keyword>a</meta:keyword><meta:keyword>b</meta:keyword><dc:title>T</dc:title>');
            const mapper = new MetadataMapper(document);

            mapper.removeAll('meta:keyword');
            const once = document.serialize();
            mapper.removeAll('meta:keyword');

            expect(document.serialize()).toBe(once);
            expect(texts(document, 'meta:keyword')).toEqual([]);
            expect(mapper.getTitle()).toBe('T');
        });

        it('should remove nested matches too', () => {
            const document = metaDocument('<text:p><text:a xlink:href="x">link</text:a></text:p><text:a>top</text:a>');
            new MetadataMapper(document).removeAll('text:a');
            expect(document.getTree().getElementsByTagName('text:a').length).toBe(0);
            expect(document.getTree().getElementsByTagName('text:p').length).toBe(1);
        });
    });

    describe('creation date', () => {
        it('should return unparseable text unchanged', () => {
            const mapper = new MetadataMapper(metaDocument('<meta:creation-date>last Tuesday</meta:creation-date>'));
            expect(mapper.getCreationDate()).toBe('last Tuesday');
        });

        it('should format a plain local date-time', () => {
            const mapper = new MetadataMapper(metaDocument('<meta:creation-date>2023-05-01T10:00:00</meta:creation-date>'));
            expect(mapper.getCreationDate()).toBe('01/05/2023 10:00');
        });

        it('should return an empty string when there is no creation date', () => {
            expect(new MetadataMapper(metaDocument('')).getCreationDate()).toBe('');
        });
    });

    describe('field table access', () => {
        it('should route getField through the descriptor', () => {
            const mapper = new MetadataMapper(metaDocument('<meta:document-statistic meta:page-count="9"/>'));
            expect(mapper.getField('pageCount')).toBe('9');
        });

        it('should refuse to write a read-only field', () => {
            const mapper = new MetadataMapper(metaDocument(''));
            expect(() => mapper.setField('wordCount', '10')).toThrowError(
                expect.objectContaining({ code: OdtErrorCode.READ_ONLY_FIELD }),
            );
        });

        it('should apply a change set in schema order and report what it wrote', () => {
            const document = metaDocument('<dc:title>T</dc:title>');
            const mapper = new MetadataMapper(document);

            const applied = mapper.applyChanges({ keywords: 'x,y', author: null, title: 'New' });

            expect(applied).toEqual(['title', 'keywords']);
            expect(mapper.getTitle()).toBe('New');
            expect(mapper.getKeywords()).toBe('x, y');
            expect(mapper.getAuthor()).toBe('');
        });
    });
});
