import axios, { AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export type StubReply = { status: number; data?: unknown } | Error;

/** axios instance answering every request through `route`; nothing leaves the process. */
export function stubClient(route: (config: InternalAxiosRequestConfig) => StubReply) {
  const seen: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      seen.push(config);
      const reply = route(config);
      if (reply instanceof Error) throw reply;
      return {
        data: reply.data ?? '',
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
        request: {},
      };
    },
  });
  return { client, seen };
}
