export {
  formatNumber,
  formatImprovement,
  renderTable,
  renderComparisonTable,
  renderAggregateTable,
  renderPivot,
  renderPerformanceReport,
  renderStructuralReport,
} from './markdown';
export type { PivotSpec } from './markdown';
