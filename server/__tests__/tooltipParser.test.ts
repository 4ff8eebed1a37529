import { cleanNumericValue, harvestPairs, parseTooltip } from '../services/tooltipParser';

describe('parseTooltip', () => {
  const monthly = { mode: 'monthly' as const, keyField: 'Date' };
  const intraday = { mode: 'intraday' as const, keyField: 'Time' };

  it('extracts the day key and the target parameters of a monthly tooltip', () => {
    const parsed = parseTooltip(
      'Date: 15 - June | Active: 45.2 kW | Apparent: 50.1 kVA',
      ['Date', 'Active', 'Apparent', 'Reactive'],
      monthly
    );

    expect(parsed).not.toBeNull();
    expect(parsed?.key).toBe('15');
    expect(parsed?.fields).toEqual(new Map([
      ['Active', '45.2 kW'],
      ['Apparent', '50.1 kVA'],
      ['Reactive', null]
    ]));
    expect(cleanNumericValue(parsed?.fields.get('Active') ?? null)).toBe('45.2');
    expect(cleanNumericValue(parsed?.fields.get('Apparent') ?? null)).toBe('50.1');
  });

  it('never reads Active out of Reactive', () => {
    const parsed = parseTooltip('Date: 2 - June | Reactive: 12.5 kVAr | Active: 40 kW', ['Active', 'Reactive'], monthly);

    expect(parsed?.fields.get('Active')).toBe('40 kW');
    expect(parsed?.fields.get('Reactive')).toBe('12.5 kVAr');
  });

  it('leaves Active unmatched when only Reactive is shown', () => {
    const parsed = parseTooltip('Date: 2 - June | Reactive: 12.5 kVAr', ['Active', 'Reactive'], monthly);

    expect(parsed?.fields.get('Active')).toBeNull();
    expect(parsed?.fields.get('Reactive')).toBe('12.5 kVAr');
  });

  it('accepts the dash separator', () => {
    const parsed = parseTooltip('Date - 7 June\nPhase 1 - 230.5 V\nPhase 2 - 231 V', ['Phase 1', 'Phase 2'], monthly);

    expect(parsed?.key).toBe('7');
    expect(parsed?.fields).toEqual(new Map([
      ['Phase 1', '230.5 V'],
      ['Phase 2', '231 V']
    ]));
  });

  it('distinguishes an empty value from a missing parameter', () => {
    const parsed = parseTooltip(
      'Date: 4 - June | Active: | Apparent: 50 kVA',
      ['Active', 'Apparent', 'Reactive'],
      monthly
    );

    expect(parsed?.fields.get('Active')).toBe('');
    expect(parsed?.fields.get('Apparent')).toBe('50 kVA');
    expect(parsed?.fields.get('Reactive')).toBeNull();
  });

  it('takes the time of day as the intraday key and harvests extra fields', () => {
    const parsed = parseTooltip(
      'Time: 10:30 | Line 1: 29.88 A | Line 2: 30,1 A | Neutral: 2.1 A',
      ['Line 1', 'Line 2'],
      intraday
    );

    expect(parsed?.key).toBe('10:30');
    expect(Array.from(parsed?.fields.keys() ?? [])).toEqual(['Line 1', 'Line 2', 'Neutral']);
    expect(parsed?.fields.get('Line 1')).toBe('29.88 A');
    expect(parsed?.fields.get('Neutral')).toBe('2.1 A');
  });

  it('pads single digit hours', () => {
    expect(parseTooltip('Time: 9:05\nPhase 1: 230 V', ['Phase 1'], intraday)?.key).toBe('09:05');
  });

  it('rejects day keys beyond the end of the month', () => {
    const parsed = parseTooltip('Date: 31 - June | Active: 1 kW', ['Active'], { ...monthly, maxDay: 30 });

    expect(parsed?.key).toBeNull();
  });

  it('returns null for blank text', () => {
    expect(parseTooltip('   ', ['Active'], monthly)).toBeNull();
    expect(parseTooltip(null, ['Active'], monthly)).toBeNull();
  });

  it('gives the same result when parsing twice', () => {
    const text = 'Date: 9 - June | Active: 45.2 kW | Power Factor: 0.98';

    expect(parseTooltip(text, ['Active'], monthly)).toEqual(parseTooltip(text, ['Active'], monthly));
  });
});

describe('harvestPairs', () => {
  it('collects colon and dash pairs in order', () => {
    expect(harvestPairs('Active: 45 kW | Line 1 - 3 A')).toEqual([
      ['Active', '45 kW'],
      ['Line 1', '3 A']
    ]);
  });
});

describe('cleanNumericValue', () => {
  it('keeps the leading number of a display value', () => {
    expect(cleanNumericValue('29.88 A')).toBe('29.88');
    expect(cleanNumericValue('-3.2 kVAr')).toBe('-3.2');
  });

  it('drops thousands separators', () => {
    expect(cleanNumericValue('1,204.5 kWh')).toBe('1204.5');
  });

  it('passes through values without digits and clean numbers', () => {
    expect(cleanNumericValue('N/A')).toBe('N/A');
    expect(cleanNumericValue('42')).toBe('42');
    expect(cleanNumericValue(null)).toBeNull();
  });
});
