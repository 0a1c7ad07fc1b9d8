export type TxnKind = 'income' | 'expense';

export type Txn = Readonly<{
  id: string;
  date: string;
  month: string;
  kind: TxnKind;
  /** Always the magnitude; the sign lives in `kind`. */
  amount: number;
  /** Negative for expenses. Plotting only, never summed. */
  signedAmount: number;
  category: string;
  subcategory: string;
  title: string;
  note: string;
  tags: readonly string[];
}>;

export type CsvRecord = Record<string, string>;

export type CsvTable = {
  headers: string[];
  records: CsvRecord[];
};

export type DataSet = {
  txns: Txn[];
  loadedAtIso: string;
  source: string;
};

export type Granularity = 'daily' | 'weekly' | 'monthly';

export type SummaryMetrics = {
  totalIncome: number;
  totalExpenses: number;
  netSavings: number;
  savingsRate: number;
  transactionCount: number;
};

export type TrendPoint = {
  period: string;
  income: number;
  expense: number;
  net: number;
};

export type CategoryTotal = {
  category: string;
  amount: number;
};

export type SubcategoryTotal = {
  category: string;
  subcategory: string;
  amount: number;
};

export type GroupSummary = {
  group: string;
  totalSpent: number;
  durationDays: number;
  /** `null` when the group has no expenses. */
  topCategory: string | null;
  transactionCount: number;
};

export type CategoryPivot = {
  categories: string[];
  groups: string[];
  cells: number[][];
};

export type DrillDownRow = {
  id: string;
  date: string;
  title: string;
  subcategory: string;
  amount: number;
  note: string;
};

export type DrillDown = {
  category: string;
  group: string;
  rows: DrillDownRow[];
  total: number;
};

export type GroupAnalysis =
  | { status: 'no-groups' }
  | { status: 'no-selection'; groups: string[] }
  | {
      status: 'ready';
      groups: string[];
      selected: string[];
      summaries: GroupSummary[];
      pivot: CategoryPivot;
    };

export type ExpenseSlice = {
  name: string;
  value: number;
  share: number;
  color: string;
};
