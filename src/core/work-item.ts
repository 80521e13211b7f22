export interface WorkItem {
  id: string;
  date: Date;          // UTC midnight unless the source carried a time
  hours: number;
  rate: number;        // per hour
  description: string;
  total: number;       // roundCents(hours * rate)
  createdAt: Date;
}

export interface WorkItemFields {
  id: string;
  date: Date;
  hours: number;
  rate: number;
  description: string;
}

/** Round half away from zero to 2 decimal places */
export function roundCents(amount: number): number {
  return (Math.sign(amount) * Math.round(Math.abs(amount) * 100)) / 100;
}

export function createWorkItem(fields: WorkItemFields, now: Date = new Date()): WorkItem {
  return {
    ...fields,
    total: roundCents(fields.hours * fields.rate),
    createdAt: now,
  };
}

/** YYYY-MM-DD in UTC */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}
