import { useMemo, useState } from 'react';
import { APP_TITLE, DEFAULT_GRANULARITY } from '../config';
import CategoryDonut from '../components/CategoryDonut';
import SubcategoryBreakdown from '../components/SubcategoryBreakdown';
import SummaryCards from '../components/SummaryCards';
import TopCategoriesTable from '../components/TopCategoriesTable';
import TopSubcategoriesTable from '../components/TopSubcategoriesTable';
import TransactionTable from '../components/TransactionTable';
import TrendTable from '../components/TrendTable';
import type { Granularity, Txn } from '../lib/data/contract';
import {
  categoryTotals,
  computeExpenseSlices,
  computeTrend,
  subcategoryTotals,
  summarize,
  topCategories,
  topSubcategories,
} from '../lib/kpis/compute';

type OverviewProps = {
  txns: readonly Txn[];
};

const GRANULARITY_OPTIONS: { value: Granularity; label: string }[] = [
  { value: 'monthly', label: 'Monthly' },
  { value: 'weekly', label: 'Weekly' },
  { value: 'daily', label: 'Daily' },
];

type CategoryView = 'basic' | 'detailed';

const VIEW_OPTIONS: { id: CategoryView; label: string }[] = [
  { id: 'basic', label: 'Basic View' },
  { id: 'detailed', label: 'Detailed View' },
];

function isGranularity(value: string): value is Granularity {
  return GRANULARITY_OPTIONS.some((option) => option.value === value);
}

export default function Overview({ txns }: OverviewProps) {
  const [granularity, setGranularity] = useState<Granularity>(DEFAULT_GRANULARITY);
  const [view, setView] = useState<CategoryView>('basic');
  const [showRawData, setShowRawData] = useState(false);

  const metrics = useMemo(() => summarize(txns), [txns]);
  const trend = useMemo(() => computeTrend(txns, granularity), [txns, granularity]);
  const slices = useMemo(() => computeExpenseSlices(txns), [txns]);
  const topSpending = useMemo(() => topCategories(txns), [txns]);
  const categories = useMemo(() => categoryTotals(txns), [txns]);
  const subcategories = useMemo(() => subcategoryTotals(txns), [txns]);
  const topSubs = useMemo(() => topSubcategories(txns), [txns]);

  return (
    <main className="page overview-page">
      <h1>{APP_TITLE}</h1>
      <SummaryCards metrics={metrics} />

      <div className="field">
        <label htmlFor="overview-granularity">Time period</label>
        <select
          id="overview-granularity"
          value={granularity}
          onChange={(event) => {
            const next = event.target.value;
            if (isGranularity(next)) setGranularity(next);
          }}
        >
          {GRANULARITY_OPTIONS.map((option) => (
            <option key={option.value} value={option.value}>
              {option.label}
            </option>
          ))}
        </select>
      </div>

      <TrendTable points={trend} granularity={granularity} />

      <section className="category-analysis">
        <h2>Category Analysis</h2>
        <div className="view-toggle">
          {VIEW_OPTIONS.map((option) => (
            <button
              key={option.id}
              type="button"
              className={view === option.id ? 'toggle-btn is-active' : 'toggle-btn'}
              aria-pressed={view === option.id}
              onClick={() => setView(option.id)}
            >
              {option.label}
            </button>
          ))}
        </div>

        {view === 'basic' ? (
          <div className="tab-grid">
            <CategoryDonut slices={slices} />
            <TopCategoriesTable categories={topSpending} />
          </div>
        ) : (
          <div className="tab-grid">
            <SubcategoryBreakdown categories={categories} subcategories={subcategories} />
            <TopSubcategoriesTable subcategories={topSubs} />
          </div>
        )}
      </section>

      <label className="field checkbox-field">
        <input type="checkbox" checked={showRawData} onChange={(event) => setShowRawData(event.target.checked)} />
        Show raw data
      </label>
      {showRawData ? <TransactionTable txns={txns} /> : null}
    </main>
  );
}
