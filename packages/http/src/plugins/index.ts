export { tracingPlugin, requireTracing } from './tracing.js';
