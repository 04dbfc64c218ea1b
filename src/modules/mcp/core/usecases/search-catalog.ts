/**
 * MCP Use Case: buscar_catalogo_completo
 *
 * Ranked fuzzy search over the full upstream indicator catalog.
 */

import { err, ok, type Result } from 'neverthrow';

import { DEFAULT_CATALOG_CANDIDATES, searchFullCatalog } from '@/modules/indicators/index.js';

import { toMcpError, type McpError } from '../errors.js';

import type { McpToolDeps } from '../ports.js';
import type { SearchFullCatalogOutput, SearchFullCatalogToolInput } from '../types.js';

export type SearchCatalogDeps = Pick<McpToolDeps, 'indicatorApi'>;

export async function searchCatalog(
  deps: SearchCatalogDeps,
  input: SearchFullCatalogToolInput
): Promise<Result<SearchFullCatalogOutput, McpError>> {
  const result = await searchFullCatalog(deps, {
    keyword: input.keyword,
    limit: input.limite ?? DEFAULT_CATALOG_CANDIDATES,
  });
  if (result.isErr()) {
    return err(toMcpError(result.error));
  }

  return ok({
    keyword: input.keyword.trim(),
    total: result.value.length,
    candidates: result.value.map((candidate) => ({
      code: candidate.code,
      name: candidate.name,
      score: candidate.score,
    })),
  });
}
