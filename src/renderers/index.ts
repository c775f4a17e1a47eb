export {
  CsvRenderer,
  TableRenderer,
  renderFailure,
  renderReport,
  renderResult,
} from './resultRenderer';
export type { OutputFormat, RenderOptions, ResultRenderer } from './resultRenderer';
