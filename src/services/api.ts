import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import config from '../config';
import { DocumentFetchError } from './errors';

export const createHttpClient = (adapter?: AxiosRequestConfig['adapter']): AxiosInstance =>
  axios.create({
    adapter,
    baseURL: config.apiBaseUrl,
    timeout: config.requestTimeoutMs,
    // status codes are checked by the callers
    validateStatus: () => true,
  });

export interface ListingPageRequest {
  year: number;
  page: number;
}

export const listingParams = ({ year, page }: ListingPageRequest) => ({
  type: config.letterRecordType,
  fromDate: `1/1/${year}`,
  toDate: `12/31/${year}`,
  format: 'csv',
  page,
});

export interface ApiClient {
  getListingPage(request: ListingPageRequest): Promise<string>;
  getDocument(url: string): Promise<ArrayBuffer>;
}

export const createApiClient = (httpClient: AxiosInstance = createHttpClient()): ApiClient => ({
  async getListingPage(request: ListingPageRequest): Promise<string> {
    const response = await httpClient.get<string>('/GetParts', {
      params: listingParams(request),
      responseType: 'text',
    });

    if (response.status !== 200) {
      throw new Error(`Listing request failed with status ${response.status}`);
    }
    return typeof response.data === 'string' ? response.data : '';
  },

  async getDocument(url: string): Promise<ArrayBuffer> {
    // absolute URL, baseURL does not apply
    const response = await httpClient
      .get<ArrayBuffer>(url, { responseType: 'arraybuffer' })
      .catch((error: unknown) => {
        console.error(`❌ PDF request failed for ${url}:`, error);
        throw new DocumentFetchError(null, url);
      });

    if (response.status !== 200) {
      throw new DocumentFetchError(response.status, url);
    }
    return response.data;
  },
});

const api = createApiClient();

export default api;
