export * from './lib/data/contract';
export { ValidationError, isValidationError } from './lib/data/errors';
export { parseCsv } from './lib/data/parseCsv';
export { loadTransactions, loadCsv, toISODateOnly } from './lib/data/normalize';
export { extractTags, stripTagLines, listGroups } from './lib/groups/tags';
export { summarizeGroup, summarizeGroups } from './lib/groups/summary';
export { buildPivot, pivotCell, drillDown } from './lib/groups/pivot';
export { analyzeGroups } from './lib/groups/analysis';
export {
  summarize,
  computeTrend,
  categoryTotals,
  subcategoryTotals,
  topCategories,
  topSubcategories,
  computeExpenseSlices,
} from './lib/kpis/compute';
export { periodKey, isoWeekKey } from './lib/kpis/period';
export { default as SummaryCards } from './components/SummaryCards';
export { default as CategoryDonut } from './components/CategoryDonut';
export { default as TrendTable } from './components/TrendTable';
export { default as GroupSummaryTable } from './components/GroupSummaryTable';
export { default as CategoryGroupTable } from './components/CategoryGroupTable';
export { default as DrillDownTable } from './components/DrillDownTable';
export { default as TopCategoriesTable } from './components/TopCategoriesTable';
export { default as TopSubcategoriesTable } from './components/TopSubcategoriesTable';
export { default as SubcategoryBreakdown } from './components/SubcategoryBreakdown';
export { default as TransactionTable } from './components/TransactionTable';
export { default as OverviewPage } from './pages/Overview';
export { default as GroupAnalysisPage } from './pages/GroupAnalysis';
