import { useEffect, useState, type DependencyList } from "react";
import { errorMessage } from "../lib/errors";

export interface Loaded<T> {
  data: T | undefined;
  loading: boolean;
  error: string | null;
}

/**
 * Runs `load` whenever `deps` change and keeps the latest result. A `null`
 * loader means there is nothing to fetch yet.
 */
export function useLoader<T>(load: (() => Promise<T>) | null, deps: DependencyList, what: string): Loaded<T> {
  const [data, setData] = useState<T | undefined>(undefined);
  const [loading, setLoading] = useState(load !== null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    if (!load) {
      setData(undefined);
      setLoading(false);
      return;
    }
    let alive = true;
    (async () => {
      try {
        setLoading(true);
        setError(null);
        const result = await load();
        if (alive) setData(result);
      } catch (e) {
        console.error(`Failed to load ${what}:`, e);
        if (alive) {
          setData(undefined);
          setError(errorMessage(e, `Failed to load ${what}`));
        }
      } finally {
        if (alive) setLoading(false);
      }
    })();
    return () => { alive = false; };
  }, deps);

  return { data, loading, error };
}
