/**
 * ProviderFields - Builders for provider-specific request fields
 *
 * The results go into AskOptions.extraFields and are merged into the
 * request body as-is. Combine several with mergeExtraFields().
 */

export type ParserEngine = 'mistral-ocr' | 'native';

/**
 * Restrict OpenRouter routing to the named providers
 */
export function openRouterProviders(...providers: string[]): Record<string, unknown> {
  return { provider: { only: providers } };
}

/**
 * Have OpenRouter parse attached images and PDFs with the given engine
 */
export function openRouterFileParser(engine: ParserEngine): Record<string, unknown> {
  return {
    plugins: [
      {
        id: 'file-parser',
        image: { engine },
        pdf: { engine },
      },
    ],
  };
}

/**
 * Shallow-merge extra field sets; later keys win
 */
export function mergeExtraFields(...fields: Array<Record<string, unknown>>): Record<string, unknown> {
  return Object.assign({}, ...fields);
}
