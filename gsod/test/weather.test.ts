import { describe, it, expect } from 'vitest';
import { parseWeatherLine, parseWeatherLines, WEATHER_LINE_TOKENS, WEATHER_SLOTS } from '../weather';
import { DateParseError, MalformedIndicatorError, NumericParseError, RowArityError } from '../errors';

const BASE_TOKENS: Record<string, string> = {
    stn: '722950',
    wban: '23174',
    date: '20200101',
    temp: '56.3',
    temp_count: '24',
    dew_point: '39.1',
    dew_point_count: '24',
    sea_level_pressure: '1017.5',
    sea_level_pressure_count: '24',
    station_pressure: '1016.3',
    station_pressure_count: '24',
    visibility: '10.0',
    visibility_count: '24',
    wind_speed: '3.1',
    wind_speed_count: '24',
    max_wind_speed: '8.0',
    max_wind_gust: '999.9',
    max_temp: '68.0',
    min_temp: '46.0*',
    precipitation: '0.00G',
    snow_depth: '999.9',
    indicators: '000000'
};

/** Build an archive line with the GSOD column spacing, overriding some tokens */
function makeLine(overrides: Record<string, string> = {}): string {
    const tokens = { ...BASE_TOKENS, ...overrides };
    return Object.values(tokens)
        .map((token, i) => (i < 3 ? token : token.padStart(7)))
        .join(' ');
}

describe('WEATHER_SLOTS', () => {
    it('declares 20 positional slots, six of them ignored counts', () => {
        expect(WEATHER_SLOTS).toHaveLength(20);
        expect(WEATHER_LINE_TOKENS).toBe(22);
        expect(WEATHER_SLOTS.filter((slot) => slot.kind === 'ignored').map((slot) => slot.name)).toEqual([
            'temp_count',
            'dew_point_count',
            'sea_level_pressure_count',
            'station_pressure_count',
            'visibility_count',
            'wind_speed_count'
        ]);
    });

    it('matches the column order of the test line builder', () => {
        expect(WEATHER_SLOTS.map((slot) => slot.name)).toEqual(Object.keys(BASE_TOKENS).slice(2));
    });
});

describe('parseWeatherLine', () => {
    it('parses a complete station-day', () => {
        const record = parseWeatherLine(makeLine());

        expect(record).toMatchObject({
            date: '2020-01-01',
            temp: 56.3,
            dewPoint: 39.1,
            seaLevelPressure: 1017.5,
            stationPressure: 1016.3,
            visibility: 10,
            windSpeed: 3.1,
            maxWindSpeed: 8,
            maxWindGust: null,
            maxTemp: 68,
            minTemp: 46,
            precipitation: 0,
            snowDepth: null,
            maxTempC: 20,
            fog: false,
            rain: false,
            snow: false,
            hail: false,
            thunder: false,
            tornado: false,
            weatherOk: true
        });
        expect(record.tempC).toBeCloseTo(13.5, 10);
        expect(record.minTempC).toBeCloseTo(70 / 9, 10);
    });

    it('exposes a fixed field set without count placeholders', () => {
        expect(Object.keys(parseWeatherLine(makeLine()))).toEqual([
            'date',
            'temp',
            'dewPoint',
            'seaLevelPressure',
            'stationPressure',
            'visibility',
            'windSpeed',
            'maxWindSpeed',
            'maxWindGust',
            'maxTemp',
            'minTemp',
            'precipitation',
            'snowDepth',
            'tempC',
            'maxTempC',
            'minTempC',
            'fog',
            'rain',
            'snow',
            'hail',
            'thunder',
            'tornado',
            'weatherOk'
        ]);
    });

    it('maps a flagged max temperature sentinel to null (scenario C)', () => {
        const record = parseWeatherLine(makeLine({ max_temp: '999.9*' }));
        expect(record.maxTemp).toBeNull();
        expect(record.maxTempC).toBeNull();
    });

    it('maps a missing mean temperature to null in both units', () => {
        const record = parseWeatherLine(makeLine({ temp: '9999.9' }));
        expect(record.temp).toBeNull();
        expect(record.tempC).toBeNull();
    });

    it('strips precipitation flags A-I before the sentinel check', () => {
        expect(parseWeatherLine(makeLine({ precipitation: '99.99' })).precipitation).toBeNull();
        expect(parseWeatherLine(makeLine({ precipitation: '45.2A' })).precipitation).toBe(45.2);
        expect(parseWeatherLine(makeLine({ precipitation: '0.12I' })).precipitation).toBe(0.12);
    });

    it('rejects a precipitation flag outside A-I', () => {
        expect(() => parseWeatherLine(makeLine({ precipitation: '0.00J' }))).toThrow(NumericParseError);
    });

    it('only strips the temperature flag from max/min temperature', () => {
        expect(() => parseWeatherLine(makeLine({ temp: '56.3*' }))).toThrow(NumericParseError);
        expect(() => parseWeatherLine(makeLine({ max_temp: '68.0A' }))).toThrow(NumericParseError);
    });

    it('decodes indicators and derives weatherOk', () => {
        const foggy = parseWeatherLine(makeLine({ indicators: '100000' }));
        expect(foggy.fog).toBe(true);
        expect([foggy.rain, foggy.snow, foggy.hail, foggy.thunder, foggy.tornado]).toEqual([false, false, false, false, false]);
        expect(foggy.weatherOk).toBe(false);

        const stormy = parseWeatherLine(makeLine({ indicators: '010011' }));
        expect(stormy).toMatchObject({ rain: true, thunder: true, tornado: true, weatherOk: false });
    });

    it('rejects a short indicator token', () => {
        expect(() => parseWeatherLine(makeLine({ indicators: '10000' }))).toThrow(MalformedIndicatorError);
    });

    it('rejects a malformed date', () => {
        expect(() => parseWeatherLine(makeLine({ date: '2020013X' }))).toThrow(DateParseError);
    });

    it('rejects lines with too few tokens', () => {
        const line = '722950 23174 20200101 56.3 24';
        try {
            parseWeatherLine(line);
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(RowArityError);
            expect((err as RowArityError).expected).toBe(22);
            expect((err as RowArityError).actual).toBe(5);
            expect((err as RowArityError).input).toBe(line);
        }
    });

    it('is deterministic', () => {
        const line = makeLine({ indicators: '001100' });
        expect(parseWeatherLine(line)).toEqual(parseWeatherLine(line));
    });
});

describe('parseWeatherLines', () => {
    it('skips blank lines', () => {
        const records = [...parseWeatherLines([makeLine(), '', '   ', makeLine({ date: '20200102' })])];
        expect(records.map((r) => r.date)).toEqual(['2020-01-01', '2020-01-02']);
    });

    it('aborts at the first bad line', () => {
        const records = parseWeatherLines([makeLine(), makeLine({ date: 'bad' }), makeLine()]);
        expect(records.next().value).toMatchObject({ date: '2020-01-01' });
        expect(() => records.next()).toThrow(DateParseError);
    });
});
