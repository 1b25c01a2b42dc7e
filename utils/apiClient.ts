// utils/apiClient.ts
import axios, { AxiosError, AxiosInstance } from 'axios';
import logger from './logger';

/** The subset of axios the feed and text-generation drivers call. Tests inject fakes. */
export type HttpClient = Pick<AxiosInstance, 'get' | 'post'>;

const apiClient = axios.create({
    timeout: 30000, // 30 seconds global timeout
    headers: {
        'User-Agent': 'Archyards-Pipeline/1.0',
        'Accept': 'application/json, application/rss+xml, application/xml;q=0.9, text/html;q=0.8, */*;q=0.5'
    }
});

// Log slow requests
apiClient.interceptors.response.use(
    (response) => response,
    (error: AxiosError) => {
        if (error.code === 'ECONNABORTED') {
            logger.warn(`⚠️ Request timed out: ${error.config?.url}`);
        }
        return Promise.reject(error);
    }
);

export default apiClient;
