import axios, { AxiosError, type AxiosAdapter, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';

export interface FakeReply {
  data: unknown;
  status?: number;
  headers?: Record<string, string>;
}

export type FakeHandler = (config: InternalAxiosRequestConfig, call: number) => FakeReply | Promise<FakeReply>;

/** An axios instance whose adapter answers in-process; every request config is kept. */
export function fakeHttp(handler: FakeHandler): { http: AxiosInstance; calls: InternalAxiosRequestConfig[] } {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = await handler(config, calls.length);
    const status = reply.status ?? 200;
    const response = {
      data: reply.data,
      status,
      statusText: String(status),
      headers: reply.headers ?? {},
      config,
    };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, response);
    }
    return response;
  };
  return { http: axios.create({ adapter }), calls };
}

export function signal(): AbortSignal {
  return new AbortController().signal;
}
