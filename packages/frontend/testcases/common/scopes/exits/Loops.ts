class Handle { fd: int; }
declare function openHandle(): Handle;
/** @operator =destroy */
function closeHandle(h: Handle): void {}
function main(more: bool, done: bool): void {
  const outer = openHandle();
  while (more) {
    const t = openHandle();
    if (done) {
      break;
    }
  }
}
