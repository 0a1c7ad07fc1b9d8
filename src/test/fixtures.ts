import type { Txn, TxnKind } from '../lib/data/contract';
import { extractTags } from '../lib/groups/tags';

type TxnInput = {
  date: string;
  amount: number;
  kind: TxnKind;
  category: string;
  subcategory?: string;
  title?: string;
  note?: string;
};

let sequence = 0;

export function makeTxn(input: TxnInput): Txn {
  sequence += 1;
  const note = input.note ?? '';
  return {
    id: `t${sequence}`,
    date: input.date,
    month: input.date.slice(0, 7),
    kind: input.kind,
    amount: input.amount,
    signedAmount: input.kind === 'expense' ? -input.amount : input.amount,
    category: input.category,
    subcategory: input.subcategory ?? '',
    title: input.title ?? input.category,
    note,
    tags: extractTags(note),
  };
}

export const CSV_HEADER = 'date,amount,income,category name,subcategory name,title,note';
