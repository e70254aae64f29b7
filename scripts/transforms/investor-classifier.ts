/**
 * Investor / Retail tagging
 *
 * A sale is an investor sale when the salesperson name on the MATT row is
 * one of a known set of investor-channel identities. Names are compared
 * byte for byte: the report pads names with spaces before the branch code,
 * and that padding is part of the identity.
 */

import * as fs from 'fs';
import defaultInvestorNames from '../../data/investor-names.json';
import { ConfigError } from '../lib/error-handler';
import { Cell, InvestorTag } from './types';

/**
 * Read an investor allowlist from a JSON file containing an array of strings
 */
export function loadInvestorNames(filePath: string): ReadonlySet<string> {
  const content: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));

  if (!Array.isArray(content) || !content.every((name): name is string => typeof name === 'string')) {
    throw new ConfigError([`Investor names file ${filePath} must contain a JSON array of strings`]);
  }

  return new Set(content);
}

export const DEFAULT_INVESTOR_NAMES: ReadonlySet<string> = new Set(defaultInvestorNames);

export function classifyInvestor(name: Cell | undefined, investorNames: ReadonlySet<string>): InvestorTag {
  return typeof name === 'string' && investorNames.has(name) ? 'Investor' : 'Retail';
}
