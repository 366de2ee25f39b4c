import type { SearchSettings } from './config';
import type { VectorIndex } from './vector';
import type { EmbeddingProvider, RepositoryRecord, SortColumn, SortDirection } from '@/types';

const KEYWORD_WEIGHT = 0.3;
const SEMANTIC_WEIGHT = 0.7;

export interface Visibility {
  showPublic: boolean;
  showPrivate: boolean;
}

export interface SortOrder {
  column: SortColumn;
  direction: SortDirection;
}

/** identity → similarity in [0, 1] for one query. */
export type SemanticLookup = (query: string) => Promise<Map<string, number>>;

export function createSemanticLookup(
  embedder: Pick<EmbeddingProvider, 'embed'>,
  vectors: Pick<VectorIndex, 'getSemanticScores'>,
  maxResults: number
): SemanticLookup {
  return async (query) => vectors.getSemanticScores(await embedder.embed(query), maxResults);
}

/**
 * Case-insensitive substring match over name, description and topics. The
 * query is matched as typed; a blank query matches everything.
 */
export function keywordMatches(record: RepositoryRecord, query: string) {
  if (!query.trim()) return true;
  const q = query.toLowerCase();
  const haystack = `${record.name} ${record.description ?? ''} ${record.topics.join(' ')}`.toLowerCase();
  return haystack.includes(q);
}

/** 0 means the record is excluded. */
export function hybridScore(keyword: boolean, semantic: number | undefined, threshold: number) {
  const s = semantic ?? 0;
  if (keyword && s > 0) return KEYWORD_WEIGHT + SEMANTIC_WEIGHT * s;
  if (keyword) return KEYWORD_WEIGHT;
  if (s >= threshold && s > 0) return SEMANTIC_WEIGHT * s;
  return 0;
}

function compareColumn(a: RepositoryRecord, b: RepositoryRecord, column: SortColumn) {
  switch (column) {
    case 'name':
      return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
    case 'visibility':
      return Number(a.private) - Number(b.private);
    case 'created':
      return a.created_at.localeCompare(b.created_at);
  }
}

export function sortByColumn(records: readonly RepositoryRecord[], { column, direction }: SortOrder) {
  const sign = direction === 'asc' ? 1 : -1;
  return [...records].sort(
    (a, b) => sign * compareColumn(a, b, column) || a.full_name.localeCompare(b.full_name)
  );
}

export function filterVisibility(records: readonly RepositoryRecord[], { showPublic, showPrivate }: Visibility) {
  return records.filter((r) => (r.private ? showPrivate : showPublic));
}

export interface RankOptions {
  query: string;
  /** Null until a semantic lookup for `query` has resolved. */
  scores: Map<string, number> | null;
  threshold: number;
  visibility: Visibility;
  sort: SortOrder;
}

/** Visible records for a query, in display order. */
export function rankRepositories(records: readonly RepositoryRecord[], options: RankOptions) {
  const ordered = sortByColumn(filterVisibility(records, options.visibility), options.sort);
  if (!options.query.trim()) return ordered;

  const { scores, threshold } = options;
  if (!scores) return ordered.filter((r) => keywordMatches(r, options.query));

  // Array#sort is stable, so equal scores keep the column order.
  return ordered
    .map((record) => ({
      record,
      score: hybridScore(keywordMatches(record, options.query), scores.get(record.full_name), threshold),
    }))
    .filter(({ score }) => score > 0)
    .sort((a, b) => b.score - a.score)
    .map(({ record }) => record);
}

export interface Page<T> {
  items: T[];
  /** 0-based, clamped to `[0, totalPages - 1]`. */
  page: number;
  totalPages: number;
  total: number;
}

export function paginate<T>(items: readonly T[], page: number, pageSize: number): Page<T> {
  const size = Math.max(1, pageSize);
  const totalPages = Math.max(1, Math.ceil(items.length / size));
  const clamped = Math.min(Math.max(0, Math.floor(page)), totalPages - 1);
  return {
    items: items.slice(clamped * size, (clamped + 1) * size),
    page: clamped,
    totalPages,
    total: items.length,
  };
}

export interface SearchView extends Page<RepositoryRecord> {
  query: string;
  semanticActive: boolean;
}

/**
 * Holds the state behind a result list: query, visibility, sort and page.
 * Semantic scores are looked up once the query has been still for
 * `debounceMs`, and a result is dropped if the query changed meanwhile.
 */
export class HybridSearchEngine {
  private repositories: RepositoryRecord[] = [];
  private query = '';
  private scores: Map<string, number> | null = null;
  private page = 0;
  private visibility: Visibility = { showPublic: true, showPrivate: true };
  private sort: SortOrder = { column: 'created', direction: 'desc' };
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inflight: Promise<void> | null = null;
  private readonly listeners = new Set<(view: SearchView) => void>();

  constructor(
    private readonly lookup: SemanticLookup | null,
    private readonly settings: Pick<SearchSettings, 'debounceMs' | 'threshold' | 'pageSize'>
  ) {}

  onChange(listener: (view: SearchView) => void) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setRepositories(records: readonly RepositoryRecord[]) {
    this.repositories = [...records];
    this.emit();
  }

  setQuery(query: string) {
    if (query === this.query) return;
    this.query = query;
    this.scores = null;
    this.page = 0;
    this.cancelTimer();
    if (query.trim() && this.lookup) {
      this.timer = setTimeout(() => {
        this.timer = null;
        this.inflight = this.refreshSemantic();
      }, this.settings.debounceMs);
    }
    this.emit();
  }

  setVisibility(visibility: Partial<Visibility>) {
    this.visibility = { ...this.visibility, ...visibility };
    this.page = 0;
    this.emit();
  }

  setSort(sort: Partial<SortOrder>) {
    this.sort = { ...this.sort, ...sort };
    this.emit();
  }

  setPage(page: number) {
    this.page = paginate(this.ranked(), page, this.settings.pageSize).page;
    this.emit();
  }

  nextPage() {
    this.setPage(this.page + 1);
  }

  prevPage() {
    this.setPage(this.page - 1);
  }

  getView(): SearchView {
    return {
      ...paginate(this.ranked(), this.page, this.settings.pageSize),
      query: this.query,
      semanticActive: this.scores !== null,
    };
  }

  /**
   * Runs the lookup for the current query now. Failures leave the view on
   * keyword matches.
   */
  async refreshSemantic() {
    const query = this.query;
    if (!query.trim() || !this.lookup) return;

    try {
      const scores = await this.lookup(query);
      if (query !== this.query) return;
      this.scores = scores;
      this.page = 0;
      this.emit();
    } catch (err) {
      console.debug('Semantic search failed, showing keyword matches only', err);
    }
  }

  /** Skips the debounce and waits for any lookup in flight. */
  async flush() {
    if (this.timer) {
      this.cancelTimer();
      this.inflight = this.refreshSemantic();
    }
    await this.inflight;
  }

  dispose() {
    this.cancelTimer();
    this.listeners.clear();
  }

  private ranked() {
    return rankRepositories(this.repositories, {
      query: this.query,
      scores: this.scores,
      threshold: this.settings.threshold,
      visibility: this.visibility,
      sort: this.sort,
    });
  }

  private cancelTimer() {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private emit() {
    if (this.listeners.size === 0) return;
    const view = this.getView();
    this.listeners.forEach((listener) => listener(view));
  }
}
