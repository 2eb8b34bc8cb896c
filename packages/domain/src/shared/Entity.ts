/** Base class for anything identified by an id rather than its attributes. */
export abstract class Entity<TId extends string = string> {
  protected constructor(private readonly _id: TId) {}

  get id(): TId {
    return this._id;
  }
}
