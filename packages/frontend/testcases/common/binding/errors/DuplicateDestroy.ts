class Handle { fd: int; }
/** @operator =destroy */
function closeHandle(h: Handle): void {}
/** @operator =destroy */
function releaseHandle(h: Handle): void {}
