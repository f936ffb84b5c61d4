/**
 * Error suggestion system for the nodeswap CLI.
 *
 * Errors that stop the CLI before an operation starts (a bad command line,
 * a broken config file, no cluster access) are printed with suggestions for
 * fixing them. Failures inside an operation carry their own remediation.
 *
 * @packageDocumentation
 */

import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import type { Suggestion } from '../reporting/types.js';
import { ArgumentError } from './args.js';
import { colorize, type DisplayOptions } from './utils/displayUtils.js';

/**
 * Kinds of error the CLI reports before or outside an operation.
 */
export type ErrorType = 'usage' | 'configuration' | 'cluster_access' | 'unknown';

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Config file involved, when known. */
  configPath?: string;
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  usage: [
    {
      text: 'Check the required options and their formats',
      action: 'nodeswap --help',
    },
    {
      text: 'Worker nodes are added with --add-new-node; control plane nodes use --expand-control-plane',
    },
  ],

  configuration: [
    {
      text: 'Check the TOML syntax and value types in the config file',
    },
    {
      text: 'Check NODESWAP_* environment variables, which override the file',
      action: 'env | grep ^NODESWAP_',
    },
    {
      text: 'Remove the file to run with the built-in defaults',
    },
  ],

  cluster_access: [
    {
      text: 'Confirm you are logged in to the cluster',
      action: 'oc whoami',
    },
    {
      text: 'Check KUBECONFIG points at the right cluster',
      action: 'oc get nodes',
    },
  ],

  unknown: [
    {
      text: 'Run again with debug logging for the oc commands involved',
      action: 'nodeswap ... --debug',
    },
  ],
};

/**
 * Infers an error type from an error message.
 */
export function inferErrorType(errorMessage: string): ErrorType {
  const lowerMessage = errorMessage.toLowerCase();

  if (
    lowerMessage.includes('unauthorized') ||
    lowerMessage.includes('forbidden') ||
    lowerMessage.includes('kubeconfig') ||
    lowerMessage.includes('connection refused') ||
    lowerMessage.includes('enoent')
  ) {
    return 'cluster_access';
  }

  if (lowerMessage.includes('toml') || lowerMessage.includes('configuration')) {
    return 'configuration';
  }

  return 'unknown';
}

/**
 * Classifies a caught error, by its class where it has one of ours.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof ArgumentError) {
    return 'usage';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'configuration';
  }
  return inferErrorType(error instanceof Error ? error.message : String(error));
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const prefix = colorize(`${String(index)}.`, 'yellow', options);
  const actionText =
    suggestion.action === undefined ? '' : `\n    ${colorize(suggestion.action, 'dim', options)}`;

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): string {
  const errorType = context.errorType ?? inferErrorType(errorMessage);
  const suggestions = ERROR_SUGGESTIONS[errorType];

  let result = `${colorize('Error:', 'red', options)} ${errorMessage}`;

  if (context.configPath !== undefined) {
    result += `\n  ${colorize('Config:', 'yellow', options)} ${context.configPath}`;
  }

  result += `\n\n${colorize('Suggestions:', 'bold', options)}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}

/**
 * Displays error message with suggestions on stderr.
 */
export function displayErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): void {
  process.stderr.write('\n' + formatErrorWithSuggestions(errorMessage, context, options) + '\n\n');
}
