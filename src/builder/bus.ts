export class BusBuilder {
  constructor(
    readonly name: string,
    readonly id: number,
    public baudrate?: number
  ) {}

  setBaudrate(baudrate: number): this {
    this.baudrate = baudrate;
    return this;
  }
}
