/**
 * Writes an uncaught error into the mount point, unless React still has
 * something rendered there: a caught render error is already on screen
 * through the error boundary and must not be overwritten.
 */
export const reportFatal = (root: HTMLElement, message: string): boolean => {
  if (root.childElementCount > 0) return false;
  const pre = document.createElement('pre');
  pre.style.cssText = 'padding:16px;white-space:pre-wrap';
  pre.textContent = message;
  root.replaceChildren(pre);
  return true;
};
