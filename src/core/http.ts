import axios, { type AxiosInstance } from 'axios';
import { AppError, TransientIOError } from './errors.js';

export const createHttpClient = (
  baseURL: string,
  timeoutMs = 10000,
  headers: Record<string, string> = {}
): AxiosInstance => {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'boxwatch/0.1', ...headers }
  });
};

/**
 * Maps a failed HTTP call onto the error taxonomy: timeouts, dropped
 * connections, 429 and 5xx become TransientIOError, anything else AppError.
 */
export const classifyHttpError = (err: unknown, label: string): AppError => {
  if (err instanceof AppError) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const details = { label, status, code: err.code };
    if (status === undefined) {
      return new TransientIOError(`${label}: ${err.code ?? 'network'} ${err.message}`, details);
    }
    if (status === 429 || status >= 500) {
      return new TransientIOError(`${label}: HTTP ${status}`, details);
    }
    return new AppError(`${label}: HTTP ${status}`, 'HTTP_ERROR', details);
  }
  return new AppError(`${label}: ${String(err)}`, 'HTTP_ERROR', { label });
};

export const getJson = async (
  client: AxiosInstance,
  path: string,
  label: string,
  params?: Record<string, string | number | undefined>
): Promise<unknown> => {
  try {
    const res = await client.get<unknown>(path, { params });
    return res.data;
  } catch (err) {
    throw classifyHttpError(err, label);
  }
};
