// ═══════════════════════════════════════════════════════════════════════════
// Screen Log - Short-lived lines of blueprint output for an on-screen overlay
// ═══════════════════════════════════════════════════════════════════════════

export interface ScreenLogConfig {
  /** Seconds a line stays visible */
  ttl: number
  /** Oldest lines are dropped beyond this count */
  maxLines: number
}

export const DEFAULT_SCREEN_LOG_CONFIG: ScreenLogConfig = {
  ttl: 2.0,
  maxLines: 6,
}

interface ScreenLine {
  text: string
  remaining: number
}

export class ScreenLog {
  private readonly config: ScreenLogConfig
  private lines: ScreenLine[] = []

  constructor(config: Partial<ScreenLogConfig> = {}) {
    this.config = { ...DEFAULT_SCREEN_LOG_CONFIG, ...config }
  }

  push(text: string): void {
    this.lines.push({ text, remaining: this.config.ttl })
    while (this.lines.length > this.config.maxLines) {
      this.lines.shift()
    }
  }

  /** Age every line by dt seconds and drop the expired ones. */
  update(dt: number): void {
    for (const line of this.lines) {
      line.remaining -= dt
    }
    this.lines = this.lines.filter(line => line.remaining > 0)
  }

  /** Visible lines, oldest first, joined with newlines. */
  text(): string {
    return this.lines.map(line => line.text).join('\n')
  }

  get size(): number {
    return this.lines.length
  }

  clear(): void {
    this.lines = []
  }
}
