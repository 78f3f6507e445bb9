import axios, { AxiosHeaders, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';

export interface FakeReply {
  status?: number;
  data?: unknown;
  /** Reject the request instead of answering it */
  error?: Error;
}

export type FakeRoute = (config: InternalAxiosRequestConfig, callIndex: number) => FakeReply;

/** An axios instance answered in-process by `route`, recording every request it receives */
export function fakeAxios(route: FakeRoute): { client: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];

  const client = axios.create({
    adapter: async (config) => {
      const reply = route(config, requests.length);
      requests.push(config);
      if (reply.error) throw reply.error;

      const status = reply.status ?? 200;
      return {
        data: reply.data ?? '',
        status,
        statusText: String(status),
        headers: new AxiosHeaders(),
        config,
      };
    },
  });

  return { client, requests };
}
