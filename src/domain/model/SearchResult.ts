export interface SearchResult {
    path: string;
    ordinal: number;
    category: string;
    content: string;
    score: number;
}

export interface SearchOptions {
    limit?: number;
    minScore?: number;
}

export const DEFAULT_SEARCH_OPTIONS: Required<SearchOptions> = {
    limit: 5,
    minScore: 0
};
