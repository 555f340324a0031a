export { PerformanceInterceptor } from './performance.interceptor';
