export class Name {
  constructor (
    public normal: string,
    public folded: string
  ) {}
}
