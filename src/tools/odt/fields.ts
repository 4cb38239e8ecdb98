/**
 * The fixed metadata schema: logical field name → XML representation.
 */

import { META_ATTRIBUTES, META_TAGS } from './constants.js';
import type { FieldDescriptor, MetadataFieldName, WritableFieldName } from './types.js';

function statistic(attribute: string, label: string): FieldDescriptor {
    return { tag: META_TAGS.STATISTICS, attribute, multiplicity: 'single', writable: false, label };
}

export const FIELD_DESCRIPTORS = {
    title: { tag: META_TAGS.TITLE, multiplicity: 'single', writable: true, label: 'Title' },
    description: { tag: META_TAGS.DESCRIPTION, multiplicity: 'single', writable: true, label: 'Description' },
    subject: { tag: META_TAGS.SUBJECT, multiplicity: 'single', writable: true, label: 'Subject' },
    keywords: { tag: META_TAGS.KEYWORD, multiplicity: 'multi', writable: true, label: 'Keywords' },
    author: { tag: META_TAGS.AUTHOR, multiplicity: 'single', writable: true, label: 'Author' },
    creationDate: { tag: META_TAGS.CREATION_DATE, multiplicity: 'single', writable: false, label: 'Creation date' },
    tableCount: statistic(META_ATTRIBUTES.TABLE_COUNT, 'Tables'),
    imageCount: statistic(META_ATTRIBUTES.IMAGE_COUNT, 'Images'),
    pageCount: statistic(META_ATTRIBUTES.PAGE_COUNT, 'Pages'),
    paragraphCount: statistic(META_ATTRIBUTES.PARAGRAPH_COUNT, 'Paragraphs'),
    wordCount: statistic(META_ATTRIBUTES.WORD_COUNT, 'Words'),
    characterCount: statistic(META_ATTRIBUTES.CHARACTER_COUNT, 'Characters'),
    nonWhitespaceCharacterCount: statistic(
        META_ATTRIBUTES.NON_WHITESPACE_CHARACTER_COUNT,
        'Non-whitespace characters',
    ),
    hyperlinks: {
        tag: META_TAGS.HYPERLINK,
        attribute: META_ATTRIBUTES.HYPERLINK_TARGET,
        multiplicity: 'multi',
        writable: false,
        label: 'Hyperlinks',
    },
} as const satisfies Record<MetadataFieldName, FieldDescriptor>;

export const METADATA_FIELD_NAMES = Object.keys(FIELD_DESCRIPTORS) as MetadataFieldName[];

export const WRITABLE_FIELD_NAMES: WritableFieldName[] = ['title', 'description', 'subject', 'keywords', 'author'];

export function isMetadataFieldName(value: string): value is MetadataFieldName {
    return Object.prototype.hasOwnProperty.call(FIELD_DESCRIPTORS, value);
}
