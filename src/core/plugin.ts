export interface Plugin {
  readonly name: string;
  start?(): Promise<void> | void;
  stop?(): Promise<void> | void;
}
