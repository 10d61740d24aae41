import { Option } from 'commander';

import { JSON_OPTION_DESCRIPTION } from '@/constants.js';

import {
  parseAlgorithmArg,
  parseDataLen,
  parseHexBytes,
  parseIdentifier,
  parseOperationArg,
} from './parsers.js';

/**
 * Shared --json flag for all commands.
 */
export const jsonOption = new Option('-j, --json', JSON_OPTION_DESCRIPTION).default(false);

/**
 * Mandatory --id <n>: the u64 correlation identifier.
 */
export function identifierOption(): Option {
  return new Option('--id <n>', 'Request identifier (decimal or 0x hex, u64)')
    .argParser(parseIdentifier)
    .makeOptionMandatory();
}

export function algorithmOption(): Option {
  return new Option('-a, --algorithm <name>', 'Algorithm name or numeric tag')
    .argParser(parseAlgorithmArg)
    .makeOptionMandatory();
}

export function operationOption(): Option {
  return new Option('-o, --operation <name>', 'Operation name or numeric tag')
    .argParser(parseOperationArg)
    .makeOptionMandatory();
}

export function dataLenOption(): Option {
  return new Option('--data-len <n>', 'Body length to announce (u32)').argParser(parseDataLen);
}

/**
 * Optional --body <hex>, decoded to bytes.
 */
export function bodyOption(description: string): Option {
  return new Option('--body <hex>', description).argParser((value: string) =>
    parseHexBytes(value, 'body')
  );
}
