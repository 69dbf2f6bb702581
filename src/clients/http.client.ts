/** Streamed HTTP GET, the body is read by the caller */
export interface HttpClient {
  get(url: string, headers: Record<string, string>): Promise<Response>;
}

export const FetchHttpClient: HttpClient = {
  get(url: string, headers: Record<string, string>): Promise<Response> {
    return fetch(url, { headers, redirect: 'follow' });
  },
};
