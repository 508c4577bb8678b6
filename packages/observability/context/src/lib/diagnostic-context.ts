import type { Breadcrumb, UserContext } from '@faultline/observability-contracts';

/**
 * Default bound on the breadcrumb trail of one context
 */
export const DEFAULT_MAX_BREADCRUMBS = 100;

/**
 * Usable breadcrumb bound: a whole number, never negative
 */
export function breadcrumbLimit(max: number): number {
  return Number.isNaN(max) ? 0 : Math.max(0, Math.floor(max));
}

/**
 * Copy of a context's state taken when an event is built
 */
export interface ContextSnapshot {
  user: UserContext;
  tags: Record<string, string>;
  extra: Record<string, unknown>;
  breadcrumbs: Breadcrumb[];
}

/**
 * Ambient diagnostic state of one execution unit (a request, a job, a task).
 *
 * Owned by the unit and passed by reference to whoever captures on its
 * behalf. Nothing here is global: two units hold two contexts.
 */
export class DiagnosticContext {
  private user: UserContext = {};
  private tags: Record<string, string> = {};
  private extra: Record<string, unknown> = {};
  private breadcrumbs: Breadcrumb[] = [];
  private readonly maxBreadcrumbs: number;

  constructor(maxBreadcrumbs = DEFAULT_MAX_BREADCRUMBS) {
    this.maxBreadcrumbs = breadcrumbLimit(maxBreadcrumbs);
  }

  /**
   * Replace the current user
   */
  setUser(user: UserContext): void {
    this.user = { ...user };
  }

  /**
   * Merge tags into the context
   */
  setTags(tags: Record<string, string>): void {
    this.tags = { ...this.tags, ...tags };
  }

  /**
   * Set a single tag
   */
  setTag(key: string, value: string): void {
    this.tags[key] = value;
  }

  /**
   * Merge extra data into the context
   */
  setExtra(extra: Record<string, unknown>): void {
    this.extra = { ...this.extra, ...extra };
  }

  /**
   * Add a breadcrumb, evicting the oldest once the trail is full
   */
  addBreadcrumb(breadcrumb: Omit<Breadcrumb, 'timestamp'> & { timestamp?: string }): void {
    const crumb: Breadcrumb = {
      ...breadcrumb,
      timestamp: breadcrumb.timestamp || new Date().toISOString(),
    };

    this.breadcrumbs.push(crumb);

    if (this.breadcrumbs.length > this.maxBreadcrumbs) {
      this.breadcrumbs.splice(0, this.breadcrumbs.length - this.maxBreadcrumbs);
    }
  }

  /**
   * Forget everything recorded so far
   */
  clear(): void {
    this.user = {};
    this.tags = {};
    this.extra = {};
    this.breadcrumbs = [];
  }

  isEmpty(): boolean {
    return (
      Object.keys(this.user).length === 0 &&
      Object.keys(this.tags).length === 0 &&
      Object.keys(this.extra).length === 0 &&
      this.breadcrumbs.length === 0
    );
  }

  /**
   * Take a copy that later writes to this context will not alter
   */
  snapshot(): ContextSnapshot {
    return {
      user: { ...this.user },
      tags: { ...this.tags },
      extra: { ...this.extra },
      breadcrumbs: this.breadcrumbs.map((crumb) => ({ ...crumb })),
    };
  }
}

let unitCounter = 0;

/**
 * A logical unit of work. Its context is created on first access and is
 * never handed to another unit.
 */
export class ExecutionUnit {
  readonly id: string;
  private ownContext: DiagnosticContext | null = null;

  constructor(
    id?: string,
    private readonly maxBreadcrumbs = DEFAULT_MAX_BREADCRUMBS,
  ) {
    unitCounter++;
    this.id = id || `unit-${unitCounter}`;
  }

  get context(): DiagnosticContext {
    if (!this.ownContext) {
      this.ownContext = new DiagnosticContext(this.maxBreadcrumbs);
    }
    return this.ownContext;
  }

  /**
   * The context if anything has touched it yet
   */
  peekContext(): DiagnosticContext | undefined {
    return this.ownContext || undefined;
  }
}
