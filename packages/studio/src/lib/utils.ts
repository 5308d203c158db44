import { type ClassValue, clsx } from 'clsx';
import { twMerge } from 'tailwind-merge';
import type { SecretType } from '../types/keyscout';

export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs));
}

export function formatTimestamp(timestamp: string | number): string {
  const date = new Date(timestamp);
  return date.toLocaleTimeString('en-US', {
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
}

export function formatPercent(part: number, total: number): string {
  if (total === 0) return '0%';
  return `${Math.round((part / total) * 100)}%`;
}

export function getTypeColor(type: SecretType): string {
  switch (type) {
    case 'static':
      return 'bg-blue-500';
    case 'rotated':
      return 'bg-green-500';
    case 'dynamic':
      return 'bg-yellow-500';
    default:
      return 'bg-gray-500';
  }
}
