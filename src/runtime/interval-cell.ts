// Drop interval shared between the consumer (writer) and the tick producer
export class IntervalCell {
  constructor(private value: number) {}

  get(): number {
    return this.value;
  }

  set(value: number): void {
    this.value = value;
  }
}
