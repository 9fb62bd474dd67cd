class Handle { fd: int; }
/** @operator =move */
function moveHandle(h: Handle): void {}
