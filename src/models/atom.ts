/**
 * A single atom read from a coordinate block.
 * Coordinates keep the unit of the source file.
 */
export class AtomRecord {
  readonly element: string;
  readonly x: number;
  readonly y: number;
  readonly z: number;

  constructor(element: string, x: number, y: number, z: number) {
    this.element = element;
    this.x = x;
    this.y = y;
    this.z = z;
    Object.freeze(this);
  }

  /**
   * Convert to JSON
   */
  toJSON() {
    return {
      element: this.element,
      x: this.x,
      y: this.y,
      z: this.z,
    };
  }
}
