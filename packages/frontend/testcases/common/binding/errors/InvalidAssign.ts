class Handle { fd: int; }
/** @operator = */
function assignHandle(dest: Handle, src: Handle): void {}
