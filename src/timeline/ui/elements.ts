export interface TimelineElements {
  searchInput: HTMLInputElement | null;
  yearFilter: HTMLSelectElement | null;
  sortOrder: HTMLSelectElement | null;
  timeline: HTMLElement | null;
  loadingMessage: HTMLElement | null;
  noResults: HTMLElement | null;
  resultCount: HTMLElement | null;
  chart: HTMLElement | null;
  upcomingSection: HTMLElement | null;
  upcomingGrid: HTMLElement | null;
  currentGrid: HTMLElement | null;
  lastUpdated: HTMLElement | null;
  statsGrid: HTMLElement | null;
}

function byId<T extends HTMLElement>(root: Document, id: string, type: { new (): T }): T | null {
  const element = root.getElementById(id);
  return element instanceof type ? element : null;
}

/**
 * Look up the page's interaction points. Missing elements come back as null and
 * the matching feature is skipped.
 * @param root
 */
export function getTimelineElements(root: Document = document): TimelineElements {
  return {
    searchInput: byId(root, 'gameSearch', HTMLInputElement),
    yearFilter: byId(root, 'yearFilter', HTMLSelectElement),
    sortOrder: byId(root, 'sortOrder', HTMLSelectElement),
    timeline: byId(root, 'gameTimeline', HTMLElement),
    loadingMessage: byId(root, 'loadingMessage', HTMLElement),
    noResults: byId(root, 'noResults', HTMLElement),
    resultCount: byId(root, 'resultCount', HTMLElement),
    chart: byId(root, 'gamesChart', HTMLElement),
    upcomingSection: byId(root, 'upcoming-games', HTMLElement),
    upcomingGrid: byId(root, 'upcomingGamesGrid', HTMLElement),
    currentGrid: byId(root, 'currentGamesGrid', HTMLElement),
    lastUpdated: byId(root, 'lastUpdated', HTMLElement),
    statsGrid: byId(root, 'statsGrid', HTMLElement)
  };
}
