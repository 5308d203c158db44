import type { FormEvent } from 'react';
import { Eye, Info, KeyRound, Loader2, Search, X } from 'lucide-react';
import { useStudio, type SelectedSecret } from '../stores/studio';
import { SECRET_TYPE_FILTERS, type SecretTypeFilter, type SecretValue } from '../types/keyscout';
import { getTypeColor } from '../lib/utils';
import { Badge } from './ui/badge';
import { Button } from './ui/button';
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from './ui/card';
import { Input } from './ui/input';

function isTypeFilter(value: string): value is SecretTypeFilter {
  return SECRET_TYPE_FILTERS.some((type) => type === value);
}

function renderValue(value: SecretValue) {
  if (value.kind === 'simple') {
    return <code className="block rounded bg-muted px-2 py-1 text-xs font-mono break-all">{value.value}</code>;
  }
  return (
    <dl className="space-y-1 text-xs font-mono">
      {Object.entries(value.fields).map(([field, fieldValue]) => (
        <div key={field} className="flex gap-2">
          <dt className="text-muted-foreground">{field}:</dt>
          <dd className="break-all">{typeof fieldValue === 'string' ? fieldValue : JSON.stringify(fieldValue)}</dd>
        </div>
      ))}
    </dl>
  );
}

function SecretDetails({ secret, onClose }: { secret: SelectedSecret; onClose: () => void }) {
  const { description, value } = secret;
  return (
    <Card className="border-primary">
      <CardHeader className="pb-3">
        <div className="flex items-center justify-between">
          <CardTitle className="text-base font-mono">{secret.path}</CardTitle>
          <Button variant="ghost" size="icon" onClick={onClose} aria-label="Close details">
            <X className="h-4 w-4" />
          </Button>
        </div>
      </CardHeader>
      <CardContent className="space-y-3 text-sm">
        {!description && !value && (
          <div className="flex items-center gap-2 text-muted-foreground">
            <Loader2 className="h-4 w-4 animate-spin" />
            Loading...
          </div>
        )}
        {description && (
          <dl className="grid grid-cols-[8rem_1fr] gap-1">
            <dt className="text-muted-foreground">Type</dt>
            <dd>{description.type}</dd>
            <dt className="text-muted-foreground">Item type</dt>
            <dd>{description.itemType}</dd>
            {description.lastVersion !== undefined && (
              <>
                <dt className="text-muted-foreground">Version</dt>
                <dd>{description.lastVersion}</dd>
              </>
            )}
            {description.metadata?.lastModified && (
              <>
                <dt className="text-muted-foreground">Modified</dt>
                <dd>{description.metadata.lastModified}</dd>
              </>
            )}
            {description.description && (
              <>
                <dt className="text-muted-foreground">Description</dt>
                <dd>{description.description}</dd>
              </>
            )}
          </dl>
        )}
        {value && renderValue(value)}
      </CardContent>
    </Card>
  );
}

export function SecretBrowser() {
  const secrets = useStudio((state) => state.secrets);
  const filter = useStudio((state) => state.filter);
  const loading = useStudio((state) => state.secretsLoading);
  const selectedSecret = useStudio((state) => state.selectedSecret);
  const setFilter = useStudio((state) => state.setFilter);
  const searchSecrets = useStudio((state) => state.searchSecrets);
  const fetchValue = useStudio((state) => state.fetchValue);
  const fetchDescription = useStudio((state) => state.fetchDescription);
  const closeSecret = useStudio((state) => state.closeSecret);

  const handleSubmit = (event: FormEvent) => {
    event.preventDefault();
    void searchSecrets();
  };

  return (
    <div className="space-y-6">
      <Card>
        <CardHeader>
          <CardTitle>Secret Browser</CardTitle>
          <CardDescription>
            {loading ? 'Searching...' : `${secrets.length} secret${secrets.length !== 1 ? 's' : ''} match the current filter`}
          </CardDescription>
        </CardHeader>
        <CardContent className="space-y-4">
          <form onSubmit={handleSubmit} className="flex gap-2">
            <div className="relative flex-1">
              <Search className="absolute left-2 top-1/2 h-4 w-4 -translate-y-1/2 text-muted-foreground" />
              <Input
                value={filter.pathPrefix}
                onChange={(event) => setFilter({ pathPrefix: event.target.value })}
                placeholder="Path prefix, e.g. /prod"
                className="pl-8"
              />
            </div>
            <select
              value={filter.type}
              onChange={(event) => {
                const type = event.target.value;
                if (isTypeFilter(type)) setFilter({ type });
              }}
              className="h-10 rounded-md border border-border bg-background px-3 text-sm"
              aria-label="Secret type"
            >
              {SECRET_TYPE_FILTERS.map((type) => (
                <option key={type} value={type}>
                  {type === 'all' ? 'All types' : type}
                </option>
              ))}
            </select>
            <Button type="submit" disabled={loading}>
              Search
            </Button>
          </form>

          {secrets.length === 0 && !loading ? (
            <div className="text-center py-12">
              <KeyRound className="h-12 w-12 mx-auto text-muted-foreground mb-4" />
              <h3 className="font-semibold mb-2">No secrets found</h3>
              <p className="text-sm text-muted-foreground">Adjust the path prefix or type filter and search again.</p>
            </div>
          ) : (
            <ul className="divide-y divide-border rounded-md border border-border">
              {secrets.map((secret) => (
                <li key={secret.path} className="flex items-center justify-between px-4 py-2">
                  <div className="flex items-center gap-3">
                    <span className={`h-2 w-2 rounded-full ${getTypeColor(secret.type)}`}></span>
                    <span className="font-mono text-sm">{secret.path}</span>
                    <Badge variant="secondary">{secret.type}</Badge>
                  </div>
                  <div className="flex gap-2">
                    <Button variant="outline" size="sm" onClick={() => void fetchValue(secret.path, secret.type)}>
                      <Eye className="h-3 w-3 mr-1" />
                      Get value
                    </Button>
                    <Button variant="ghost" size="sm" onClick={() => void fetchDescription(secret.path)}>
                      <Info className="h-3 w-3 mr-1" />
                      Details
                    </Button>
                  </div>
                </li>
              ))}
            </ul>
          )}
        </CardContent>
      </Card>

      {selectedSecret && <SecretDetails secret={selectedSecret} onClose={closeSecret} />}
    </div>
  );
}
