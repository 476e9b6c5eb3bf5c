/**
 * Export the message file schema to a static JSON file.
 *
 * Lets the vault sync tooling validate message files without this package.
 * Run with: npm run docs:export-schema
 */
import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { generateMessageSchemaDocument } from '@a2a/shared/schema-registry';

const OUTPUT_PATH = 'docs/schema/a2a-message.json';

const document = generateMessageSchemaDocument();

mkdirSync(dirname(OUTPUT_PATH), { recursive: true });

writeFileSync(OUTPUT_PATH, JSON.stringify(document, null, 2));
console.log(`Message schema exported to ${OUTPUT_PATH}`);
