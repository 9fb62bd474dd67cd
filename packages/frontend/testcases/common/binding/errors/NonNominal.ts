/** @operator =destroy */
function closeFd(fd: int): void {}
