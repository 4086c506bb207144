export class WarningCollector {
  private list: string[] = [];

  constructor(private readonly limit = 5000) {}

  add(message: string) {
    if (this.list.length < this.limit) this.list.push(message);
  }

  toArray(): string[] {
    return this.list.slice();
  }
}
