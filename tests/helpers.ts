import type { SupabaseClient } from '@supabase/supabase-js';
import { vi } from 'vitest';
import type { EntityKind, HistoryProfile, HistorySource } from '../engine/src/types';
import { type FetchLike, Logger } from '../src/lib/resilience';

// ═══════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════

export function createSink() {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function silentLogger(): Logger {
    return new Logger('error', createSink());
}

// ═══════════════════════════════════════════════════════════════════════════
// FETCH
// ═══════════════════════════════════════════════════════════════════════════

export interface Route {
    match: (url: URL, init?: RequestInit) => boolean;
    respond: (url: URL, init?: RequestInit) => Response | Promise<Response>;
}

export interface RecordedRequest {
    url: URL;
    init?: RequestInit;
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json', ...headers },
    });
}

/** Routes requests by URL; anything unrouted is a 404 */
export function createFetchStub(routes: Route[]): { fetchImpl: FetchLike; requests: RecordedRequest[] } {
    const requests: RecordedRequest[] = [];
    const fetchImpl: FetchLike = async (input, init) => {
        const url = new URL(input);
        requests.push({ url, init });
        const route = routes.find(r => r.match(url, init));
        return route ? route.respond(url, init) : new Response('not found', { status: 404 });
    };
    return { fetchImpl, requests };
}

// ═══════════════════════════════════════════════════════════════════════════
// HISTORY
// ═══════════════════════════════════════════════════════════════════════════

export class StubHistory implements HistorySource {
    readonly calls: string[] = [];
    private readonly profiles: Record<string, HistoryProfile>;

    constructor(profiles: Record<string, HistoryProfile>) {
        this.profiles = profiles;
    }

    async getProfile(kind: EntityKind, entityName: string): Promise<HistoryProfile | null> {
        this.calls.push(`${kind}:${entityName}`);
        return this.profiles[entityName] ?? null;
    }
}

export function playerProfile(name: string, pts: number[], teamAbbr?: string): HistoryProfile {
    return {
        kind: 'player',
        entityName: name,
        sampleCount: pts.length,
        series: { PTS: pts },
        ...(teamAbbr ? { teamAbbr } : {}),
    };
}

export function teamProfile(name: string, pts: number[]): HistoryProfile {
    return { kind: 'team', entityName: name, sampleCount: pts.length, series: { PTS: pts } };
}

// ═══════════════════════════════════════════════════════════════════════════
// SUPABASE
// ═══════════════════════════════════════════════════════════════════════════

export type Row = Record<string, unknown>;
type Op = 'select' | 'insert' | 'upsert' | 'update';
type QueryResult = { data: unknown; error: Error | null };

export interface SupabaseMock {
    client: SupabaseClient;
    tables: Record<string, Row[]>;
    calls: Array<{ table: string; op: Op }>;
}

/**
 * In-memory tables behind the query-builder calls the services make.
 * `failures` maps "table:op" to the error message that operation returns.
 */
export function createSupabaseMock(
    seed: Record<string, Row[]> = {},
    failures: Partial<Record<`${string}:${Op}`, string>> = {},
): SupabaseMock {
    const tables: Record<string, Row[]> = {};
    for (const [name, rows] of Object.entries(seed)) tables[name] = rows.map(r => ({ ...r }));
    const calls: SupabaseMock['calls'] = [];
    let nextId = 1;

    const rowsOf = (table: string): Row[] => {
        tables[table] ??= [];
        return tables[table];
    };

    class QueryBuilder implements PromiseLike<QueryResult> {
        private op: Op = 'select';
        private payload: Row[] = [];
        private readonly filters: Array<(row: Row) => boolean> = [];
        private ordering: { column: string; ascending: boolean } | null = null;
        private onConflict: string | undefined;
        private returning = false;

        constructor(private readonly table: string) {}

        select(_columns?: string): this {
            if (this.op !== 'select') this.returning = true;
            return this;
        }

        insert(rows: Row | Row[]): this {
            this.op = 'insert';
            this.payload = Array.isArray(rows) ? rows : [rows];
            return this;
        }

        upsert(rows: Row | Row[], options: { onConflict?: string } = {}): this {
            this.op = 'upsert';
            this.payload = Array.isArray(rows) ? rows : [rows];
            this.onConflict = options.onConflict;
            return this;
        }

        update(patch: Row): this {
            this.op = 'update';
            this.payload = [patch];
            return this;
        }

        eq(column: string, value: unknown): this {
            this.filters.push(row => row[column] === value);
            return this;
        }

        is(column: string, value: null | boolean): this {
            this.filters.push(row => (row[column] ?? null) === value);
            return this;
        }

        order(column: string, options: { ascending?: boolean } = {}): this {
            this.ordering = { column, ascending: options.ascending ?? true };
            return this;
        }

        maybeSingle(): Promise<QueryResult> {
            return this.execute().then(r => ({ ...r, data: Array.isArray(r.data) ? r.data[0] ?? null : r.data }));
        }

        single(): Promise<QueryResult> {
            return this.execute().then(r => {
                const first = Array.isArray(r.data) ? r.data[0] : r.data;
                return first ? { ...r, data: first } : { data: null, error: r.error ?? new Error('no rows') };
            });
        }

        then<T1 = QueryResult, T2 = never>(
            onfulfilled?: ((value: QueryResult) => T1 | PromiseLike<T1>) | null,
            onrejected?: ((reason: unknown) => T2 | PromiseLike<T2>) | null,
        ): Promise<T1 | T2> {
            return this.execute().then(onfulfilled, onrejected);
        }

        private matches(row: Row): boolean {
            return this.filters.every(f => f(row));
        }

        private async execute(): Promise<QueryResult> {
            calls.push({ table: this.table, op: this.op });
            const failure = failures[`${this.table}:${this.op}`];
            if (failure) return { data: null, error: new Error(failure) };

            const rows = rowsOf(this.table);
            switch (this.op) {
                case 'select': {
                    const selected = rows.filter(r => this.matches(r));
                    const order = this.ordering;
                    if (order) {
                        const dir = order.ascending ? 1 : -1;
                        selected.sort((a, b) => dir * (Number(a[order.column]) - Number(b[order.column])));
                    }
                    return { data: selected, error: null };
                }
                case 'insert': {
                    const inserted = this.payload.map(r => ({ id: nextId++, ...r }));
                    rows.push(...inserted);
                    return { data: this.returning ? inserted : null, error: null };
                }
                case 'upsert': {
                    const key = this.onConflict ?? 'id';
                    for (const row of this.payload) {
                        const existing = rows.findIndex(r => r[key] === row[key]);
                        if (existing >= 0) rows[existing] = { ...rows[existing], ...row };
                        else rows.push({ ...row });
                    }
                    return { data: null, error: null };
                }
                case 'update':
                    for (const row of rows) {
                        if (this.matches(row)) Object.assign(row, this.payload[0]);
                    }
                    return { data: null, error: null };
            }
        }
    }

    const client = { from: (table: string) => new QueryBuilder(table) };
    // the services only reach `from`; the full client surface is not modelled
    return { client: client as unknown as SupabaseClient, tables, calls };
}
