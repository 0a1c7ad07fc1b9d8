import type { SummaryMetrics } from '../lib/data/contract';
import { formatCurrency, formatPercent } from '../lib/format';

type SummaryCardsProps = {
  metrics: SummaryMetrics;
};

type SummaryCard = {
  id: string;
  label: string;
  value: string;
  tone: 'is-up' | 'is-down' | 'is-flat';
};

function toneFor(value: number): SummaryCard['tone'] {
  if (value > 0) return 'is-up';
  if (value < 0) return 'is-down';
  return 'is-flat';
}

function buildCards(metrics: SummaryMetrics): SummaryCard[] {
  return [
    { id: 'income', label: 'Total Income', value: formatCurrency(metrics.totalIncome), tone: 'is-flat' },
    { id: 'expenses', label: 'Total Expenses', value: formatCurrency(metrics.totalExpenses), tone: 'is-flat' },
    {
      id: 'net',
      label: 'Net Savings',
      value: formatCurrency(metrics.netSavings),
      tone: toneFor(metrics.netSavings),
    },
    {
      id: 'savingsRate',
      label: 'Savings Rate',
      value: formatPercent(metrics.savingsRate),
      tone: toneFor(metrics.savingsRate),
    },
  ];
}

export default function SummaryCards({ metrics }: SummaryCardsProps) {
  return (
    <section className="kpi-grid" aria-label="Key metrics">
      {buildCards(metrics).map((card) => (
        <article className="kpi-card" key={card.id} data-testid={`kpi-${card.id}`}>
          <p className="kpi-label">{card.label}</p>
          <p className={`kpi-value ${card.tone}`}>{card.value}</p>
        </article>
      ))}
    </section>
  );
}
