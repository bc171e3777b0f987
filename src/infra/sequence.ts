export class SequenceGenerator {
  constructor(private readonly prefix: string, private counter = 0) {}

  next(): string {
    return `${this.prefix}${this.counter++}`;
  }
}
