import type { ChartRect } from '../types/telemetry';
import { ChartSession, readTooltipText, withChartSession } from '../services/chartSession';

class TextSession implements ChartSession {
  queries: Array<string | undefined> = [];
  closed = false;

  constructor(private readonly texts: Record<string, string | null>, private readonly documentText: string | null = null) {}

  async findElement(_query: string, _timeoutMs: number): Promise<ChartRect | null> {
    return null;
  }

  async dispatchPointerMove(_x: number, _y: number): Promise<void> {}

  async readVisibleText(query?: string): Promise<string | null> {
    this.queries.push(query);
    return query === undefined ? this.documentText : this.texts[query] ?? null;
  }

  async captureScreenshot(_area: ChartRect, _filePath: string): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe('readTooltipText', () => {
  it('returns the first selector with visible text', async () => {
    const session = new TextSession({ '.a': '  ', '.b': 'Active: 1', '.c': 'Active: 2' });

    await expect(readTooltipText(session, { selectors: ['.a', '.b', '.c'], documentFallback: false }))
      .resolves.toBe('Active: 1');
    expect(session.queries).toEqual(['.a', '.b']);
  });

  it('reads the whole document only when allowed', async () => {
    const session = new TextSession({}, 'Date: 1 - June');

    await expect(readTooltipText(session, { selectors: ['.a'], documentFallback: false })).resolves.toBeNull();
    await expect(readTooltipText(session, { selectors: ['.a'], documentFallback: true })).resolves.toBe('Date: 1 - June');
  });
});

describe('withChartSession', () => {
  it('closes the session when the work fails', async () => {
    const session = new TextSession({});

    await expect(withChartSession(async () => session, async () => {
      throw new Error('scan failed');
    })).rejects.toThrow('scan failed');
    expect(session.closed).toBe(true);
  });

  it('returns the result and closes the session', async () => {
    const session = new TextSession({});

    await expect(withChartSession(async () => session, async () => 'done')).resolves.toBe('done');
    expect(session.closed).toBe(true);
  });
});
