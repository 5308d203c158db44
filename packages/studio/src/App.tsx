import { AlertCircle, BarChart3, KeyRound, MessageSquare, X, type LucideIcon } from 'lucide-react';
import { Badge } from './components/ui/badge';
import { Button } from './components/ui/button';
import { Card, CardContent } from './components/ui/card';
import { TabsList, TabsTrigger } from './components/ui/tabs';
import { ChatPanel } from './components/chat-panel';
import { SecretBrowser } from './components/secret-browser';
import { AnalyticsDashboard } from './components/analytics-dashboard';
import { useAnalytics, useHealth, useSecretBrowser } from './hooks/use-keyscout';
import { useSecretCount, useStudio, type StudioTab } from './stores/studio';

const TABS: { value: StudioTab; label: string; icon: LucideIcon }[] = [
  { value: 'chat', label: 'Chat', icon: MessageSquare },
  { value: 'secrets', label: 'Secrets', icon: KeyRound },
  { value: 'analytics', label: 'Analytics', icon: BarChart3 },
];

function App() {
  const { health, isConnected } = useHealth();
  const activeTab = useStudio((state) => state.activeTab);
  const setActiveTab = useStudio((state) => state.setActiveTab);
  const error = useStudio((state) => state.error);
  const dismissError = useStudio((state) => state.dismissError);
  const secretCount = useSecretCount();
  useAnalytics();
  useSecretBrowser();

  return (
    <div className="min-h-screen bg-background text-foreground">
      {/* Header */}
      <header className="sticky top-0 z-50 border-b border-border bg-card/95 backdrop-blur">
        <div className="container mx-auto flex h-16 items-center justify-between px-4">
          <div className="flex items-center gap-3">
            <div className="flex h-10 w-10 items-center justify-center rounded-lg bg-primary shadow-lg">
              <KeyRound className="h-6 w-6 text-primary-foreground" />
            </div>
            <div>
              <h1 className="text-xl font-bold">Keyscout Studio</h1>
              <p className="text-xs text-muted-foreground">Ask questions about your Akeyless secrets</p>
            </div>
          </div>

          {/* Status Badge */}
          <Badge variant={isConnected ? 'success' : 'outline'}>
            <span className={`mr-1.5 h-2 w-2 rounded-full ${isConnected ? 'bg-green-500' : 'bg-gray-500'}`}></span>
            {isConnected ? `API ${health?.version ?? ''}`.trim() : 'API unreachable'}
          </Badge>
        </div>
      </header>

      {/* Main Content */}
      <main className="container mx-auto p-6 space-y-6">
        <TabsList>
          {TABS.map(({ value, label, icon: Icon }) => (
            <TabsTrigger key={value} active={activeTab === value} onClick={() => setActiveTab(value)}>
              <Icon className="h-4 w-4" />
              {label}
              {value === 'secrets' && secretCount > 0 && <Badge variant="secondary">{secretCount}</Badge>}
            </TabsTrigger>
          ))}
        </TabsList>

        {error && (
          <Card className="border-red-500/50">
            <CardContent className="flex items-center justify-between pt-6">
              <div className="flex items-center gap-2 text-sm">
                <AlertCircle className="h-5 w-5 text-red-500" />
                {error}
              </div>
              <Button variant="ghost" size="icon" onClick={dismissError} aria-label="Dismiss error">
                <X className="h-4 w-4" />
              </Button>
            </CardContent>
          </Card>
        )}

        {activeTab === 'chat' && <ChatPanel />}
        {activeTab === 'secrets' && <SecretBrowser />}
        {activeTab === 'analytics' && <AnalyticsDashboard />}
      </main>
    </div>
  );
}

export default App;
