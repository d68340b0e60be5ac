/**
 * Chainable stand-in for the Supabase query builder. Every filter method
 * records its arguments and returns the chain; awaiting the chain yields
 * the canned result for the table.
 */

export interface CannedResult {
  data: unknown;
  error: { message: string } | null;
}

export interface RecordedCall {
  table: string;
  method: string;
  args: unknown[];
}

const CHAIN_METHODS = ['select', 'eq', 'in', 'order', 'limit'] as const;

export function createSupabaseMock() {
  const results = new Map<string, CannedResult>();
  const calls: RecordedCall[] = [];

  function from(table: string) {
    const chain: Record<string, unknown> = {};
    for (const method of CHAIN_METHODS) {
      chain[method] = (...args: unknown[]) => {
        calls.push({ table, method, args });
        return chain;
      };
    }
    chain.then = (resolve: (value: CannedResult) => unknown, reject: (reason: unknown) => unknown) =>
      Promise.resolve(results.get(table) ?? { data: [], error: null }).then(resolve, reject);
    return chain;
  }

  return {
    client: { from },
    results,
    calls,
    respond(table: string, data: unknown, error: CannedResult['error'] = null) {
      results.set(table, { data, error });
    },
    reset() {
      results.clear();
      calls.length = 0;
    },
  };
}
