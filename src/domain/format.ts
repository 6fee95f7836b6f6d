import { format, isValid, parseISO } from 'date-fns';

const currencyFormat = new Intl.NumberFormat('en-IN', { style: 'currency', currency: 'INR' });

export function formatCurrency(amount: number): string {
  return currencyFormat.format(amount);
}

/** Formats an ISO date; unparseable input is returned unchanged */
export function formatDate(date: string, pattern = 'MMM dd, yyyy'): string {
  const parsed = parseISO(date);
  return isValid(parsed) ? format(parsed, pattern) : date;
}
