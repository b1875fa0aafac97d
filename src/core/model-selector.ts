/** Tracks the model the user picked, falling back to the first listed one. */
export class ModelSelector {
  private selected: string | null = null;
  private available: string[] = [];

  get current(): string | null {
    return this.selected;
  }

  get models(): string[] {
    return [...this.available];
  }

  sync(models: string[]): string | null {
    this.available = [...models];
    if (this.selected === null || !this.available.includes(this.selected)) {
      this.selected = this.available[0] ?? null;
    }
    return this.selected;
  }

  select(modelId: string): boolean {
    if (!this.available.includes(modelId)) {
      return false;
    }
    this.selected = modelId;
    return true;
  }
}
