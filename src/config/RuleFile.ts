/**
 * RuleFile - JSON list of pattern/color rules passed with --rules
 *
 * Example:
 * {
 *   "schemaVersion": "1.0",
 *   "defaultColor": { "fg": 11 },
 *   "rules": [
 *     { "pattern": "ERROR", "color": { "fg": 15, "bg": 1 } },
 *     { "pattern": "user=(\\w+)" }
 *   ]
 * }
 */

import * as fs from 'fs';
import type { Color } from '../core/types.js';
import type { PatternRule } from '../models/HighlightConfig.js';
import { validateRuleFile } from '../utils/SchemaValidator.js';

export interface RuleFile {
  schemaVersion?: string;
  defaultColor?: Color;
  rules: PatternRule[];
}

export function parseRuleFile(content: string, source: string): RuleFile {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse rules file ${source}: ${reason}`);
  }
  return validateRuleFile(data);
}

export function loadRuleFile(filePath: string): RuleFile {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Rules file not found: ${filePath}`);
  }
  return parseRuleFile(fs.readFileSync(filePath, 'utf-8'), filePath);
}
