/**
 * Base class for all Value Objects in the domain.
 * Value Objects are immutable and compared by their properties, not by identity.
 */
export abstract class ValueObject<T extends object> {
  protected readonly props: Readonly<T>;

  protected constructor(props: T) {
    this.props = Object.freeze({ ...props });
  }

  /**
   * Compares two value objects property by property.
   */
  public equals(other: ValueObject<T> | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }
    const mine = Object.entries(this.props);
    const theirs = new Map(Object.entries(other.props));
    if (mine.length !== theirs.size) {
      return false;
    }
    return mine.every(([key, value]) => theirs.has(key) && theirs.get(key) === value);
  }

  /**
   * Returns the raw properties of the value object.
   */
  public toValue(): Readonly<T> {
    return this.props;
  }
}
