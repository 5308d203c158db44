/**
 * Chat Session
 *
 * Transcript of one user's conversation. Passed explicitly to every turn;
 * there is no shared session state.
 */

import { randomUUID } from 'crypto'
import type { ClassifiedIntent } from '../intent/types'
import type { FacadeResult } from '../facade/secret-operations'
import type { ErrorKind } from '../errors'

export interface TurnError {
  kind: ErrorKind | 'internal'
  message: string
}

export interface ChatTurn {
  id: string
  userText: string
  classified?: ClassifiedIntent
  result?: FacadeResult
  error?: TurnError
  response: string
  createdAt: string
}

export interface ChatSessionSnapshot {
  id: string
  createdAt: string
  turns: ChatTurn[]
}

export const DEFAULT_MAX_TURNS = 100

export class ChatSession {
  public readonly id: string
  public readonly createdAt: Date
  private readonly maxTurns: number
  private turnList: ChatTurn[] = []

  constructor(options: { id?: string; maxTurns?: number; now?: Date } = {}) {
    this.id = options.id ?? randomUUID()
    this.createdAt = options.now ?? new Date()
    this.maxTurns = Math.max(1, options.maxTurns ?? DEFAULT_MAX_TURNS)
  }

  get turns(): readonly ChatTurn[] {
    return this.turnList
  }

  /**
   * Append a turn; the oldest turns are dropped past maxTurns
   */
  append(turn: ChatTurn): void {
    this.turnList.push(turn)
    if (this.turnList.length > this.maxTurns) {
      this.turnList = this.turnList.slice(this.turnList.length - this.maxTurns)
    }
  }

  clear(): void {
    this.turnList = []
  }

  toJSON(): ChatSessionSnapshot {
    return {
      id: this.id,
      createdAt: this.createdAt.toISOString(),
      turns: [...this.turnList],
    }
  }
}
