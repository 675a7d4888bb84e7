/**
 * Request body for the NixOS search backend (Elasticsearch query DSL)
 */
import { SEARCH_RESULT_LIMIT } from "../constants.js";
import type { SearchQuery } from "../types/index.js";

/**
 * Attribute name weighs most, then programs and short name, then description.
 */
export const SEARCH_FIELDS = [
  "package_attr_name^3",
  "package_programs^2",
  "package_pname^2",
  "package_description",
] as const;

export function buildSearchQuery(text: string, size: number = SEARCH_RESULT_LIMIT): SearchQuery {
  return {
    from: 0,
    size,
    query: {
      bool: {
        must: [{ multi_match: { query: text, fields: [...SEARCH_FIELDS] } }],
        filter: [{ term: { type: { value: "package" } } }],
      },
    },
    sort: [{ _score: "desc" }, { package_attr_name: "asc" }],
  };
}
