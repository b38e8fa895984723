export interface Bus {
  readonly id: number;
  readonly name: string;
  readonly baudrate: number;
}
