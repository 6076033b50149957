/**
 * SchemaValidator - JSON Schema validation utilities
 *
 * Uses ajv for runtime validation of rules files.
 * Schemas are loaded from the schemas/ directory.
 */

import Ajv from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { RuleFile } from '../config/RuleFile.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const RULES_SCHEMA_FILE = 'rules-v1.0.json';

/**
 * Find schema directory from multiple possible locations
 */
function findSchemaDir(): string {
  // src/utils/SchemaValidator.ts and dist/utils/SchemaValidator.js both sit two levels below the package root
  const candidates = [
    path.join(__dirname, '../../schemas'),
    path.join(process.cwd(), 'schemas'),
    path.join(process.cwd(), 'node_modules/linetint/schemas'),
  ];

  for (const dir of candidates) {
    if (fs.existsSync(path.join(dir, RULES_SCHEMA_FILE))) {
      return dir;
    }
  }

  // Default to first candidate (loadSchema reports the miss)
  return candidates[0];
}

let _schemaDir: string | null = null;

function getSchemaDir(): string {
  if (!_schemaDir) {
    _schemaDir = findSchemaDir();
  }
  return _schemaDir;
}

export class SchemaValidationError extends Error {
  constructor(
    public readonly schemaName: string,
    public readonly errors: ErrorObject[],
    public readonly data: unknown
  ) {
    super(SchemaValidationError.formatErrors(schemaName, errors));
    this.name = 'SchemaValidationError';
  }

  static formatErrors(schemaName: string, errors: ErrorObject[]): string {
    const lines = errors.map(e => {
      const pathStr = e.instancePath || '/';
      const msg = e.message ?? 'Unknown error';
      const allowed = e.params && 'allowedValues' in e.params
        ? ` (allowed: ${JSON.stringify(e.params.allowedValues)})`
        : '';
      return `  - ${pathStr}: ${msg}${allowed}`;
    });

    return `Invalid ${schemaName}:\n` + lines.join('\n');
  }
}

let _ajv: Ajv.default | null = null;
let _rulesValidator: ValidateFunction<RuleFile> | null = null;

function getAjv(): Ajv.default {
  if (!_ajv) {
    _ajv = new Ajv.default({
      allErrors: true,           // Collect all errors, not just first
      strict: false,             // Allow draft-07 keywords such as "definitions"
    });
  }
  return _ajv;
}

function loadSchema(filename: string): SchemaObject {
  const schemaDir = getSchemaDir();
  const filePath = path.join(schemaDir, filename);
  if (!fs.existsSync(filePath)) {
    throw new Error(
      `Schema file not found: ${filePath}\n` +
      `Please ensure the schemas directory is properly installed.`
    );
  }
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function getRulesValidator(): ValidateFunction<RuleFile> {
  if (!_rulesValidator) {
    _rulesValidator = getAjv().compile<RuleFile>(loadSchema(RULES_SCHEMA_FILE));
  }
  return _rulesValidator;
}

/**
 * Validate a parsed rules file
 *
 * @throws SchemaValidationError if invalid
 */
export function validateRuleFile(content: unknown): RuleFile {
  const validator = getRulesValidator();
  if (!validator(content)) {
    throw new SchemaValidationError('rules file', validator.errors ?? [], content);
  }
  return content;
}
