// Markdown rendering of the final answer for a property-search turn.

import type { CommunityAnalysis, CommunityStory, EnrichedListing, PointOfInterest } from '@/types/estate';

export interface PropertyReportInput {
  summary: string;
  totalFound: number;
  listings: EnrichedListing[];
  community: CommunityAnalysis | null;
  mapUrl: string | null;
}

const MAX_HIGHLIGHTS = 3;
const MAX_NEARBY = 5;

function formatDistance(meters: number): string {
  return meters >= 1000 ? `${(meters / 1000).toFixed(1)} km` : `${Math.round(meters)} m`;
}

function renderPoi(poi: PointOfInterest): string {
  const category = poi.category.replace(/_/g, ' ');
  const detail =
    poi.distanceMeters !== undefined ? `${category}, ${formatDistance(poi.distanceMeters)}` : category;
  return `- ${poi.name} (${detail})\n`;
}

export function renderListing(listing: EnrichedListing, position: number): string {
  let text = `## Property ${position}\n\n`;

  if (listing.title) text += `### 📍 ${listing.title}\n\n`;
  if (listing.imageUrl) text += `![Property Image](${listing.imageUrl})\n\n`;
  if (listing.price) text += `**💰 Price:** ${listing.price}\n\n`;

  const details: string[] = [];
  if (listing.beds !== undefined) details.push(`${listing.beds} beds`);
  if (listing.baths !== undefined) details.push(`${listing.baths} baths`);
  if (listing.sqft !== undefined) details.push(`${listing.sqft} sqft`);
  if (details.length > 0) text += `**🏡 Details:** ${details.join(' | ')}\n\n`;

  if (listing.latitude !== undefined && listing.longitude !== undefined) {
    text += `**📌 Coordinates:** ${listing.latitude}, ${listing.longitude}\n\n`;
  }
  if (listing.link) text += `**🔗 Listing:** ${listing.link}\n\n`;

  if (listing.pointsOfInterest.length > 0) {
    text += `**🗺️ Nearby:**\n\n`;
    for (const poi of listing.pointsOfInterest.slice(0, MAX_NEARBY)) text += renderPoi(poi);
    text += '\n';
  }

  return `${text}---\n\n`;
}

function renderStories(heading: string, stories: CommunityStory[]): string {
  if (stories.length === 0) return '';
  let text = `**${heading}**\n\n`;
  for (const story of stories.slice(0, MAX_HIGHLIGHTS)) {
    text += `- **${story.title}**\n`;
    if (story.summary) text += `  ${story.summary}\n`;
    if (story.url) text += `  [Read more](${story.url})\n`;
    text += '\n';
  }
  return text;
}

export function renderCommunity(community: CommunityAnalysis): string {
  let text = `## 🏘️ Community Analysis: ${community.location}\n\n`;

  if (community.overallScore !== null) text += `**Overall Score:** ${community.overallScore}/10\n\n`;
  if (community.overallExplanation) text += `**Overview:** ${community.overallExplanation}\n\n`;
  if (community.safetyScore !== null) text += `**🛡️ Safety Score:** ${community.safetyScore}/10\n\n`;
  if (community.schoolScore !== null) {
    text += `**🎓 School Rating:** ${community.schoolScore}/10\n`;
    text += community.schoolExplanation ? `   *${community.schoolExplanation}*\n\n` : '\n';
  }
  if (community.housingPricePerSqft !== null) {
    text += `**💵 Housing Price per Sqft:** $${community.housingPricePerSqft}\n\n`;
  }
  if (community.avgHouseSizeSqft !== null) {
    text += `**📏 Average House Size:** ${community.avgHouseSizeSqft} sqft\n\n`;
  }

  text += renderStories('✅ Positive Highlights:', community.positiveStories);
  text += renderStories('⚠️ Considerations:', community.negativeStories);
  return text;
}

export function renderPropertyReport(input: PropertyReportInput): string {
  if (input.listings.length === 0) {
    const summary = input.summary || 'No properties found matching your search. Try adjusting your criteria.';
    return input.community ? `${summary}\n\n${renderCommunity(input.community)}` : summary;
  }

  let text = `# 🏠 Property Search Results\n\n`;
  if (input.summary) text += `**${input.summary}**\n\n`;
  text += `Found **${input.totalFound}** properties matching your criteria.\n\n`;

  if (input.mapUrl) {
    text += `## 📍 Map View\n\n`;
    text += `![Properties Map](${input.mapUrl})\n\n`;
    text += `*Numbered markers correspond to properties listed below*\n\n`;
  }

  text += '---\n\n';
  input.listings.forEach((listing, i) => {
    text += renderListing(listing, i + 1);
  });

  if (input.community) text += renderCommunity(input.community);
  return text;
}
