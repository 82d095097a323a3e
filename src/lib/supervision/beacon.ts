import type { FailureReport, SupervisedNode } from './types';
import { SupervisionCycleError } from './errors';

/**
 * A node's link into the supervision tree.
 *
 * The tree is for visibility, not ownership: a parent learns about failures
 * below it and can render the tree, but reattaching a beacon never starts or
 * stops anything. Each beacon has at most one parent.
 */
export class Beacon {
  public readonly node: SupervisedNode;

  private _parent: Beacon | null = null;
  private _children: Beacon[] = [];

  constructor(node: SupervisedNode, parent: Beacon | null = null) {
    this.node = node;

    if (parent) {
      this.reattach(parent);
    }
  }

  public get parent(): Beacon | null {
    return this._parent;
  }

  public get children(): readonly Beacon[] {
    return [...this._children];
  }

  public get root(): Beacon {
    let current: Beacon = this;

    while (current._parent) {
      current = current._parent;
    }

    return current;
  }

  public get depth(): number {
    let depth = 0;
    let current = this._parent;

    while (current) {
      depth++;
      current = current._parent;
    }

    return depth;
  }

  /**
   * Create a beacon for `node` attached under this one
   */
  public new(node: SupervisedNode): Beacon {
    return new Beacon(node, this);
  }

  /**
   * Move this beacon under a new parent, detaching it from the old one
   */
  public reattach(parent: Beacon): void {
    if (parent === this._parent) {
      return;
    }

    if (parent === this || this.isAncestorOf(parent)) {
      throw new SupervisionCycleError({
        nodeLabel: this.node.label,
        parentLabel: parent.node.label,
      });
    }

    this.detach();
    this._parent = parent;
    parent._children.push(this);
  }

  public detach(): void {
    if (!this._parent) {
      return;
    }

    this._parent._children = this._parent._children.filter(
      (child) => child !== this,
    );
    this._parent = null;
  }

  public isAncestorOf(other: Beacon): boolean {
    let current = other._parent;

    while (current) {
      if (current === this) {
        return true;
      }

      current = current._parent;
    }

    return false;
  }

  /**
   * Labels from the root down to this beacon's node
   */
  public path(): string[] {
    const labels: string[] = [];
    let current: Beacon | null = this;

    while (current) {
      labels.unshift(current.node.label);
      current = current._parent;
    }

    return labels;
  }

  /**
   * Depth-first, pre-order walk of this beacon and everything below it
   */
  public *walk(): Generator<Beacon> {
    yield this;

    for (const child of this._children) {
      yield* child.walk();
    }
  }

  /**
   * Hand a failure report to the parent node, if any
   */
  public reportToParent(report: FailureReport): boolean {
    if (!this._parent) {
      return false;
    }

    this._parent.node.receiveFailureReport(report);
    return true;
  }
}
