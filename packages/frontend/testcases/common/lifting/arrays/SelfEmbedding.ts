class Node { value: int; next: Node; }
function main(): void {}
