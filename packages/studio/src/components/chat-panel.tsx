import { useEffect, useRef, useState, type FormEvent } from 'react';
import { BarChart3, List, Loader2, MessageSquare, Send, Trash2 } from 'lucide-react';
import { useStudio } from '../stores/studio';
import type { ChatMessage } from '../types/keyscout';
import { cn, formatTimestamp } from '../lib/utils';
import { Badge } from './ui/badge';
import { Button } from './ui/button';
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from './ui/card';
import { Input } from './ui/input';

const QUICK_ACTIONS = [
  { label: 'List all secrets', message: 'List all my secrets', icon: List },
  { label: 'Secret statistics', message: 'How many secrets do I have of each type?', icon: BarChart3 },
];

function MessageBubble({ message }: { message: ChatMessage }) {
  const isUser = message.role === 'user';
  return (
    <div className={cn('flex', isUser ? 'justify-end' : 'justify-start')}>
      <div
        className={cn(
          'max-w-[80%] rounded-lg px-4 py-2 text-sm',
          isUser ? 'bg-primary text-primary-foreground' : 'bg-muted',
          message.errorKind && 'border border-red-500/40'
        )}
      >
        <pre className="whitespace-pre-wrap font-sans">{message.text}</pre>
        <div className="mt-1 flex items-center gap-2 text-[10px] opacity-70">
          <span>{formatTimestamp(message.createdAt)}</span>
          {message.intent && <Badge variant="outline">{message.intent}</Badge>}
          {message.errorKind && <Badge variant="destructive">{message.errorKind}</Badge>}
        </div>
      </div>
    </div>
  );
}

export function ChatPanel() {
  const messages = useStudio((state) => state.messages);
  const isSending = useStudio((state) => state.isSending);
  const sendMessage = useStudio((state) => state.sendMessage);
  const clearChat = useStudio((state) => state.clearChat);
  const [draft, setDraft] = useState('');
  const endRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    endRef.current?.scrollIntoView({ behavior: 'smooth' });
  }, [messages.length]);

  const handleSubmit = (event: FormEvent) => {
    event.preventDefault();
    const text = draft;
    setDraft('');
    void sendMessage(text);
  };

  return (
    <Card>
      <CardHeader>
        <div className="flex items-center justify-between">
          <div>
            <CardTitle>Chat</CardTitle>
            <CardDescription>Ask about your secrets in plain language</CardDescription>
          </div>
          <div className="flex gap-2">
            {QUICK_ACTIONS.map(({ label, message, icon: Icon }) => (
              <Button key={label} variant="outline" size="sm" disabled={isSending} onClick={() => void sendMessage(message)}>
                <Icon className="h-3 w-3 mr-1" />
                {label}
              </Button>
            ))}
            <Button variant="ghost" size="sm" onClick={() => void clearChat()}>
              <Trash2 className="h-3 w-3 mr-1" />
              Clear chat
            </Button>
          </div>
        </div>
      </CardHeader>
      <CardContent className="space-y-4">
        <div className="h-[420px] overflow-y-auto space-y-3 rounded-md border border-border p-4">
          {messages.length === 0 ? (
            <div className="flex h-full items-center justify-center text-center">
              <div className="max-w-sm">
                <MessageSquare className="h-12 w-12 mx-auto text-muted-foreground mb-4" />
                <p className="text-sm text-muted-foreground">
                  Try "list all my secrets", "get the value of /prod/db-password" or "show rotated secrets under /prod".
                </p>
              </div>
            </div>
          ) : (
            messages.map((message) => <MessageBubble key={message.id} message={message} />)
          )}
          {isSending && (
            <div className="flex items-center gap-2 text-sm text-muted-foreground">
              <Loader2 className="h-4 w-4 animate-spin" />
              Thinking...
            </div>
          )}
          <div ref={endRef} />
        </div>
        <form onSubmit={handleSubmit} className="flex gap-2">
          <Input
            value={draft}
            onChange={(event) => setDraft(event.target.value)}
            placeholder="Ask about your secrets..."
            maxLength={2000}
            disabled={isSending}
          />
          <Button type="submit" disabled={isSending || draft.trim() === ''}>
            <Send className="h-4 w-4" />
          </Button>
        </form>
      </CardContent>
    </Card>
  );
}
