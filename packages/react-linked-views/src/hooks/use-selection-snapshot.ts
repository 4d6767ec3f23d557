/**
 * Hook to read the current selection snapshot of a LinkGroup.
 * Re-renders whenever the group accepts a change.
 */
import { useStore } from '@tanstack/react-store';
import { useOptionalLinkGroup } from '../context';
import type { LinkGroup, SelectionSnapshot } from '@linked-views/core';

export function useSelectionSnapshot(linkGroup?: LinkGroup): SelectionSnapshot {
  const group = useResolvedLinkGroup(linkGroup, 'useSelectionSnapshot');
  return useStore(group.store);
}

/**
 * An explicit group wins over the one from context.
 */
export function useResolvedLinkGroup(
  linkGroup: LinkGroup | undefined,
  hookName: string,
): LinkGroup {
  const contextGroup = useOptionalLinkGroup();
  const group = linkGroup ?? contextGroup;
  if (!group) {
    throw new Error(
      `${hookName} needs a LinkGroup argument or a LinkGroupProvider`,
    );
  }
  return group;
}
