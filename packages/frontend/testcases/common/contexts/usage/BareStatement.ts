class Handle { fd: int; }
declare function openHandle(): Handle;
/** @operator =destroy */
function closeHandle(h: Handle): void {}
function main(): void {
  openHandle();
}
