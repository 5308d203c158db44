import { BarChart3, KeyRound, Loader2, RefreshCw, RotateCw, Zap } from 'lucide-react';
import { useStudio } from '../stores/studio';
import type { SecretType } from '../types/keyscout';
import { formatPercent, getTypeColor } from '../lib/utils';
import { Badge } from './ui/badge';
import { Button } from './ui/button';
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from './ui/card';

const TYPE_ORDER: SecretType[] = ['static', 'rotated', 'dynamic', 'other'];

const TYPE_LABELS: Record<SecretType, string> = {
  static: 'Static',
  rotated: 'Rotated',
  dynamic: 'Dynamic',
  other: 'Other',
};

export function AnalyticsDashboard() {
  const counts = useStudio((state) => state.counts);
  const breakdown = useStudio((state) => state.breakdown);
  const loading = useStudio((state) => state.analyticsLoading);
  const loadAnalytics = useStudio((state) => state.loadAnalytics);

  if (!counts || !breakdown) {
    return (
      <div className="flex items-center justify-center py-12">
        <div className="text-center max-w-sm">
          {loading ? (
            <Loader2 className="h-12 w-12 mx-auto text-muted-foreground mb-4 animate-spin" />
          ) : (
            <BarChart3 className="h-12 w-12 mx-auto text-muted-foreground mb-4" />
          )}
          <h3 className="font-semibold mb-2">{loading ? 'Loading analytics' : 'No Analytics Available'}</h3>
          {!loading && (
            <Button size="sm" onClick={() => void loadAnalytics()}>
              Load analytics
            </Button>
          )}
        </div>
      </div>
    );
  }

  const largest = Math.max(1, ...TYPE_ORDER.map((type) => counts[type]));

  return (
    <div className="space-y-6">
      <div className="flex items-center justify-between">
        <div>
          <h2 className="text-2xl font-bold">Secret Analytics</h2>
          <p className="text-sm text-muted-foreground">{counts.summary}</p>
        </div>
        <Button variant="outline" size="sm" disabled={loading} onClick={() => void loadAnalytics()}>
          <RefreshCw className={`h-3 w-3 mr-1 ${loading ? 'animate-spin' : ''}`} />
          Refresh
        </Button>
      </div>

      {/* Top-level Stats */}
      <div className="grid gap-4 md:grid-cols-2 lg:grid-cols-4">
        <Card>
          <CardHeader className="flex flex-row items-center justify-between space-y-0 pb-2">
            <CardTitle className="text-sm font-medium">Total Secrets</CardTitle>
            <KeyRound className="h-4 w-4 text-muted-foreground" />
          </CardHeader>
          <CardContent>
            <div className="text-2xl font-bold">{counts.total}</div>
          </CardContent>
        </Card>
        <Card>
          <CardHeader className="flex flex-row items-center justify-between space-y-0 pb-2">
            <CardTitle className="text-sm font-medium">Static</CardTitle>
            <KeyRound className="h-4 w-4 text-muted-foreground" />
          </CardHeader>
          <CardContent>
            <div className="text-2xl font-bold">{counts.static}</div>
            <p className="text-xs text-muted-foreground">{formatPercent(counts.static, counts.total)} of total</p>
          </CardContent>
        </Card>
        <Card>
          <CardHeader className="flex flex-row items-center justify-between space-y-0 pb-2">
            <CardTitle className="text-sm font-medium">Rotated</CardTitle>
            <RotateCw className="h-4 w-4 text-muted-foreground" />
          </CardHeader>
          <CardContent>
            <div className="text-2xl font-bold">{counts.rotated}</div>
            <p className="text-xs text-muted-foreground">{formatPercent(counts.rotated, counts.total)} of total</p>
          </CardContent>
        </Card>
        <Card>
          <CardHeader className="flex flex-row items-center justify-between space-y-0 pb-2">
            <CardTitle className="text-sm font-medium">Dynamic</CardTitle>
            <Zap className="h-4 w-4 text-muted-foreground" />
          </CardHeader>
          <CardContent>
            <div className="text-2xl font-bold">{counts.dynamic}</div>
            <p className="text-xs text-muted-foreground">{formatPercent(counts.dynamic, counts.total)} of total</p>
          </CardContent>
        </Card>
      </div>

      {/* Distribution */}
      <Card>
        <CardHeader>
          <CardTitle>Distribution by Type</CardTitle>
          <CardDescription>Number of secrets per type</CardDescription>
        </CardHeader>
        <CardContent className="space-y-3">
          {TYPE_ORDER.map((type) => (
            <div key={type} className="space-y-1">
              <div className="flex items-center justify-between text-sm">
                <span>{TYPE_LABELS[type]}</span>
                <span className="text-muted-foreground">{counts[type]}</span>
              </div>
              <div className="h-2 w-full rounded-full bg-muted overflow-hidden">
                <div
                  className={`h-full ${getTypeColor(type)} transition-all`}
                  style={{ width: `${(counts[type] / largest) * 100}%` }}
                ></div>
              </div>
            </div>
          ))}
        </CardContent>
      </Card>

      {/* Per-type listings */}
      <div className="grid gap-4 md:grid-cols-2">
        {TYPE_ORDER.map((type) => (
          <Card key={type}>
            <CardHeader className="pb-3">
              <div className="flex items-center justify-between">
                <CardTitle className="text-base">{TYPE_LABELS[type]} secrets</CardTitle>
                <Badge variant="secondary">{breakdown.itemsByType[type].length}</Badge>
              </div>
            </CardHeader>
            <CardContent>
              {breakdown.itemsByType[type].length === 0 ? (
                <p className="text-sm text-muted-foreground">None</p>
              ) : (
                <ul className="space-y-1 text-sm font-mono">
                  {breakdown.itemsByType[type].map((path) => (
                    <li key={path}>{path}</li>
                  ))}
                </ul>
              )}
            </CardContent>
          </Card>
        ))}
      </div>
    </div>
  );
}
