export type ArgNode = { kind: "leaf"; value: string } | { kind: "group"; children: ArgNode[] };

export function leaf(value: string): ArgNode {
  return { kind: "leaf", value };
}

export function group(children: ArgNode[]): ArgNode {
  return { kind: "group", children };
}

/** Depth-first, left to right, any depth. Empty-string leaves are dropped. */
export function flattenArgs(nodes: readonly ArgNode[]): string[] {
  const out: string[] = [];
  const visit = (node: ArgNode): void => {
    if (node.kind === "leaf") {
      if (node.value !== "") out.push(node.value);
      return;
    }
    for (const child of node.children) visit(child);
  };
  for (const node of nodes) visit(node);
  return out;
}

// Convenience for nested string arrays, e.g. [["-o", "out.sam"], "-S", ["-i", ["R1", "R2"]]].
export type NestedArgs = string | readonly NestedArgs[];

export function toArgNode(value: NestedArgs): ArgNode {
  if (typeof value === "string") return leaf(value);
  return group(value.map(toArgNode));
}
