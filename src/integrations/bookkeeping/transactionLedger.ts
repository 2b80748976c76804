/**
 * Write-back surface of a bookkeeping system: the category assigned to each
 * transaction. A null category means uncategorized.
 */
export interface TransactionLedger {
  getCategories(transactionIds: string[]): Promise<Record<string, string | null>>;
  setCategories(updates: Record<string, string | null>): Promise<void>;
}

export class InMemoryTransactionLedger implements TransactionLedger {
  private readonly categories: Map<string, string | null>;

  constructor(initial: Record<string, string | null> = {}) {
    this.categories = new Map(Object.entries(initial));
  }

  async getCategories(transactionIds: string[]): Promise<Record<string, string | null>> {
    return Object.fromEntries(transactionIds.map((id) => [id, this.categories.get(id) ?? null]));
  }

  async setCategories(updates: Record<string, string | null>): Promise<void> {
    for (const [id, category] of Object.entries(updates)) {
      this.categories.set(id, category);
    }
  }

  categoryOf(transactionId: string): string | null {
    return this.categories.get(transactionId) ?? null;
  }
}
