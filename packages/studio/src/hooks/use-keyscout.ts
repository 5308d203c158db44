import { useEffect, useState } from 'react';
import { keyscoutClient } from '../lib/keyscout-client';
import { describeError, useStudio } from '../stores/studio';
import type { HealthStatus } from '../types/keyscout';

const HEALTH_POLL_MS = 30_000;

/**
 * Polls the API health endpoint
 * Call this once at the app level
 */
export function useHealth() {
  const [health, setHealth] = useState<HealthStatus | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;

    const check = () => {
      keyscoutClient
        .health()
        .then((status) => {
          if (cancelled) return;
          setHealth(status);
          setError(null);
        })
        .catch((err: unknown) => {
          if (cancelled) return;
          setHealth(null);
          setError(describeError(err));
        });
    };

    check();
    const timer = setInterval(check, HEALTH_POLL_MS);
    return () => {
      cancelled = true;
      clearInterval(timer);
    };
  }, []);

  return { health, error, isConnected: health !== null };
}

/**
 * Loads analytics the first time the tab is shown
 */
export function useAnalytics() {
  const activeTab = useStudio((state) => state.activeTab);
  const counts = useStudio((state) => state.counts);
  const loadAnalytics = useStudio((state) => state.loadAnalytics);

  useEffect(() => {
    if (activeTab === 'analytics' && counts === null) {
      void loadAnalytics();
    }
  }, [activeTab, counts, loadAnalytics]);
}

/**
 * Runs the initial secret search the first time the browser is shown
 */
export function useSecretBrowser() {
  const activeTab = useStudio((state) => state.activeTab);
  const searchSecrets = useStudio((state) => state.searchSecrets);
  const [loaded, setLoaded] = useState(false);

  useEffect(() => {
    if (activeTab === 'secrets' && !loaded) {
      setLoaded(true);
      void searchSecrets();
    }
  }, [activeTab, loaded, searchSecrets]);
}
