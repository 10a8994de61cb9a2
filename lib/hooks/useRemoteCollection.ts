import { DependencyList, useEffect, useState } from "react";

export interface RemoteCollectionOptions<T> {
  url: string;
  mapItem: (raw: unknown) => T | null;
  dependencies?: DependencyList;
  extractItems?: (payload: unknown) => unknown[];
  enabled?: boolean;
}

export interface RemoteCollectionState<T> {
  items: T[];
  loading: boolean;
  error: string | null;
}

function field(payload: unknown, key: string): unknown {
  if (!payload || typeof payload !== "object") return undefined;
  const value: unknown = Reflect.get(payload, key);
  return value;
}

function defaultExtractItems(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  const items = field(payload, "items");
  return Array.isArray(items) ? items : [];
}

export function useRemoteCollection<T>({
  url,
  mapItem,
  dependencies = [],
  extractItems = defaultExtractItems,
  enabled = true,
}: RemoteCollectionOptions<T>): RemoteCollectionState<T> {
  const [items, setItems] = useState<T[]>([]);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    if (!enabled) return;
    let active = true;

    (async () => {
      setLoading(true);
      setError(null);
      try {
        const response = await fetch(url, { cache: "no-store" });
        const payload: unknown = await response.json();
        if (!response.ok) {
          const message = field(payload, "error");
          throw new Error(typeof message === "string" ? message : `HTTP ${response.status}`);
        }
        const mapped = extractItems(payload)
          .map((raw) => mapItem(raw))
          .filter((value): value is T => value !== null);
        if (active) {
          setItems(mapped);
        }
      } catch (err) {
        if (active) {
          setError(err instanceof Error ? err.message : String(err));
        }
      } finally {
        if (active) {
          setLoading(false);
        }
      }
    })();

    return () => {
      active = false;
    };
  }, [url, mapItem, extractItems, enabled, ...dependencies]);

  return { items, loading, error };
}
