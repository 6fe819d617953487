import type { GraphStore } from "../db/GraphStore.js";
import type { FunctionName } from "../db/Types.js";

/** A cycle as a path that starts and ends with the same function. */
export type Cycle = FunctionName[];

interface TarjanNode {
  name: FunctionName;
  /** Position in store insertion order */
  order: number;
  successors: TarjanNode[];
  selfLoop: boolean;
  index: number;
  lowLink: number;
  onStack: boolean;
}

interface Frame {
  node: TarjanNode;
  next: number;
}

interface Component {
  /** First member reached by the DFS */
  root: TarjanNode;
  members: TarjanNode[];
}

const UNVISITED = -1;

/**
 * Load the graph once into linked nodes. Successor lists follow node
 * insertion order, which fixes the DFS order and therefore the output.
 */
const loadNodes = (store: GraphStore): TarjanNode[] => {
  const byName = new Map<FunctionName, TarjanNode>();
  const nodes = store.nodes().map((n, order): TarjanNode => {
    const node: TarjanNode = {
      name: n.name,
      order,
      successors: [],
      selfLoop: false,
      index: UNVISITED,
      lowLink: UNVISITED,
      onStack: false,
    };
    byName.set(n.name, node);
    return node;
  });

  for (const { caller, callee } of store.edges()) {
    const source = byName.get(caller);
    const target = byName.get(callee);
    if (!source || !target) continue;
    source.successors.push(target);
    if (source === target) {
      source.selfLoop = true;
    }
  }

  for (const node of nodes) {
    node.successors.sort((a, b) => a.order - b.order);
  }

  return nodes;
};

/**
 * Tarjan's strongly connected components, with an explicit stack so deep
 * call chains cannot overflow the JS stack. Components come out in
 * completion order.
 */
const findComponents = (nodes: TarjanNode[]): Component[] => {
  const components: Component[] = [];
  const stack: TarjanNode[] = [];
  let counter = 0;

  const visit = (node: TarjanNode, frames: Frame[]): void => {
    node.index = counter;
    node.lowLink = counter;
    counter++;
    node.onStack = true;
    stack.push(node);
    frames.push({ node, next: 0 });
  };

  for (const start of nodes) {
    if (start.index !== UNVISITED) continue;

    const frames: Frame[] = [];
    visit(start, frames);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (!frame) break;
      const { node } = frame;
      const successor = node.successors[frame.next];

      if (successor) {
        frame.next++;
        if (successor.index === UNVISITED) {
          visit(successor, frames);
        } else if (successor.onStack) {
          node.lowLink = Math.min(node.lowLink, successor.index);
        }
        continue;
      }

      frames.pop();
      const parent = frames[frames.length - 1];
      if (parent) {
        parent.node.lowLink = Math.min(parent.node.lowLink, node.lowLink);
      }

      if (node.lowLink === node.index) {
        const members: TarjanNode[] = [];
        let member: TarjanNode | undefined;
        do {
          member = stack.pop();
          if (!member) break;
          member.onStack = false;
          members.push(member);
        } while (member !== node);
        members.sort((a, b) => a.order - b.order);
        components.push({ root: node, members });
      }
    }
  }

  return components;
};

/**
 * Walk from the component root through its members, successors in order,
 * until an edge leads back to the root. The root's own self edge does not
 * count; self-loops are reported separately.
 */
const representativeCycle = (component: Component): Cycle => {
  const { root } = component;
  const members = new Set(component.members);
  const visited = new Set<TarjanNode>([root]);
  const frames: Frame[] = [{ node: root, next: 0 }];

  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    if (!frame) break;
    const successor = frame.node.successors[frame.next];
    if (!successor) {
      frames.pop();
      continue;
    }
    frame.next++;

    if (successor === root && frames.length > 1) {
      return [...frames.map((f) => f.node.name), root.name];
    }
    if (members.has(successor) && !visited.has(successor)) {
      visited.add(successor);
      frames.push({ node: successor, next: 0 });
    }
  }

  return [];
};

/**
 * Report every cycle of the call graph.
 *
 * Each strongly connected component with two or more members yields one
 * representative cycle starting at the member the DFS reached first. Every
 * self-calling function yields `[name, name]`, whatever its component size.
 * Components are reported in completion order; within one, the multi-node
 * cycle comes before the self-loops of its members.
 *
 * @example
 * // a → b → a, x → x
 * detectCycles(store); // [["a", "b", "a"], ["x", "x"]]
 */
export const detectCycles = (store: GraphStore): Cycle[] => {
  const nodes = loadNodes(store);
  const cycles: Cycle[] = [];

  for (const component of findComponents(nodes)) {
    if (component.members.length > 1) {
      const cycle = representativeCycle(component);
      if (cycle.length > 0) {
        cycles.push(cycle);
      }
    }
    for (const member of component.members) {
      if (member.selfLoop) {
        cycles.push([member.name, member.name]);
      }
    }
  }

  return cycles;
};
