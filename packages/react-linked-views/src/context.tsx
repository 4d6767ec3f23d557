/**
 * Context provider for a LinkGroup.
 * Allows any component or hook in the subtree to reach the shared selection.
 */
import { createContext, useContext, useEffect, useState } from 'react';
import { LinkGroup } from '@linked-views/core';
import type { ReactNode } from 'react';
import type { Dataset, LinkGroupOptions } from '@linked-views/core';

export const LinkGroupContext = createContext<LinkGroup | null>(null);

export type LinkGroupProviderProps =
  | { linkGroup: LinkGroup; children: ReactNode }
  | { dataset: Dataset; options?: LinkGroupOptions; children: ReactNode };

/**
 * Provides an existing LinkGroup, or creates one over `dataset` once mounted
 * and disposes it on unmount. Children render once a group is available.
 */
export function LinkGroupProvider(props: LinkGroupProviderProps) {
  const external = 'linkGroup' in props ? props.linkGroup : null;
  const dataset = 'dataset' in props ? props.dataset : null;
  const options = 'dataset' in props ? props.options : undefined;

  // Inline option objects would otherwise recreate the group every render
  const optionsJson = JSON.stringify(options ?? {});
  const [owned, setOwned] = useState<LinkGroup | null>(null);

  useEffect(() => {
    if (!dataset) {
      setOwned(null);
      return;
    }
    const group = new LinkGroup(dataset, options);
    setOwned(group);
    return () => group.dispose();
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [dataset, optionsJson]);

  const value = external ?? owned;
  if (!value) {
    return null;
  }

  return (
    <LinkGroupContext.Provider value={value}>
      {props.children}
    </LinkGroupContext.Provider>
  );
}

/**
 * Hook to retrieve the active LinkGroup.
 * Throws if used outside of a LinkGroupProvider.
 */
export function useLinkGroup(): LinkGroup {
  const context = useContext(LinkGroupContext);
  if (!context) {
    throw new Error('useLinkGroup must be used within a LinkGroupProvider');
  }
  return context;
}

/**
 * Like useLinkGroup, but returns null outside of a provider.
 */
export function useOptionalLinkGroup(): LinkGroup | null {
  return useContext(LinkGroupContext);
}
