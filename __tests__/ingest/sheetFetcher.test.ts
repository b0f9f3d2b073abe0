import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GAMES } from '../../src/core/games.js';
import { ApiError, SourceUnavailableError } from '../../src/errors/index.js';
import { decodeCsv, fetchSheet } from '../../src/ingest/sheetFetcher.js';
import { httpGet } from '../../src/util/http.js';

vi.mock('../../src/util/http.js', () => ({
  httpGet: vi.fn()
}));

const game = GAMES.lotto_6_42;
const expectedUrl = `https://docs.google.com/spreadsheets/d/${game.sheetId}/gviz/tq?tqx=out%3Acsv&sheet=Sheet1`;

describe('sheetFetcher', () => {
  beforeEach(() => {
    vi.mocked(httpGet).mockReset();
  });

  it('should request the CSV export and decode it', async () => {
    vi.mocked(httpGet).mockResolvedValueOnce({
      status: 200,
      contentType: 'text/csv; charset=utf-8',
      data: '"LOTTO GAME","COMBINATIONS","DRAW DATE"\n"Lotto 6/42","01-02-03-04-05-06","1/2/2020"\n'
    });

    const result = await fetchSheet(game);

    expect(httpGet).toHaveBeenCalledWith(expectedUrl, { responseType: 'text', timeoutMs: 30000 });
    expect(result).toEqual({
      ok: true,
      url: expectedUrl,
      table: {
        header: ['LOTTO GAME', 'COMBINATIONS', 'DRAW DATE'],
        rows: [['Lotto 6/42', '01-02-03-04-05-06', '1/2/2020']]
      }
    });
  });

  it('should report a client error as source unavailable', async () => {
    vi.mocked(httpGet).mockResolvedValueOnce({ status: 403, data: 'Forbidden' });

    const result = await fetchSheet(game);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SourceUnavailableError);
      expect(result.error.gameId).toBe('lotto_6_42');
      expect(result.error.message).toBe('Sheet for lotto_6_42 returned HTTP 403; make sure it is publicly readable');
    }
  });

  it('should reject an HTML page served with status 200', async () => {
    vi.mocked(httpGet).mockResolvedValueOnce({
      status: 200,
      contentType: 'text/html; charset=utf-8',
      data: '<!DOCTYPE html><html><body>Sign in</body></html>'
    });

    const result = await fetchSheet(game);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Sheet for lotto_6_42 returned HTML instead of CSV');
    }
  });

  it('should report network failures with the cause attached', async () => {
    const cause = new ApiError('HTTP request failed: timeout of 30000ms exceeded', expectedUrl, 0);
    vi.mocked(httpGet).mockRejectedValueOnce(cause);

    const result = await fetchSheet(game);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Could not reach sheet for lotto_6_42');
      expect(result.error.cause).toBe(cause);
      expect(result.error.url).toBe(expectedUrl);
    }
  });

  it('should report text that is not valid CSV', async () => {
    vi.mocked(httpGet).mockResolvedValueOnce({ status: 200, data: 'a,"b\nc,d' });

    const result = await fetchSheet(game);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Sheet for lotto_6_42 is not valid CSV');
    }
  });

  it('should build the URL from a custom source', async () => {
    vi.mocked(httpGet).mockResolvedValueOnce({ status: 200, data: 'A,B\n' });

    const result = await fetchSheet(game, {
      source: { baseUrl: 'https://sheets.example.test/d/', sheetName: 'Draws 2024' },
      timeoutMs: 500
    });

    expect(httpGet).toHaveBeenCalledWith(
      `https://sheets.example.test/d/${game.sheetId}/gviz/tq?tqx=out%3Acsv&sheet=Draws+2024`,
      { responseType: 'text', timeoutMs: 500 }
    );
    expect(result.ok && result.table).toEqual({ header: ['A', 'B'], rows: [] });
  });

  it('should report an empty body as a sheet without a header row', async () => {
    vi.mocked(httpGet).mockResolvedValueOnce({ status: 200, contentType: 'text/csv', data: '' });

    const result = await fetchSheet(game);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SourceUnavailableError);
      expect(result.error.message).toBe('Sheet for lotto_6_42 returned no header row');
    }
  });

  describe('decodeCsv', () => {
    it('should tolerate rows of different lengths', () => {
      expect(decodeCsv('A,B,C\n1,2\n3,4,5,6\n')).toEqual({
        header: ['A', 'B', 'C'],
        rows: [['1', '2'], ['3', '4', '5', '6']]
      });
    });
  });
});
