import type { AdaptiveCardElement, TeamsMessage, TrackCard, TrackCardEntry, TrackRecord } from "./types";

const EMPTY_CARD_TEXT = "No tracks played recently.";

export function escapeMarkdown(text: string): string {
  return text.replace(/[\\[\]]/g, (match) => `\\${match}`);
}

function buildCardTitle(username: string): string {
  return `${username}'s recently played tracks`;
}

function toEntry(track: TrackRecord, index: number): TrackCardEntry {
  const position = index + 1;
  const title = escapeMarkdown(track.title);
  const label = track.trackUrl ? `[${title}](${track.trackUrl})` : title;

  return {
    position,
    text: `${position}. ${label} by ${escapeMarkdown(track.artist)}`,
    trackUrl: track.trackUrl
  };
}

export function buildTrackCard(username: string, tracks: readonly TrackRecord[]): TrackCard {
  const [mostRecent] = tracks;

  return {
    title: buildCardTitle(username),
    headerImageUrl: mostRecent ? mostRecent.albumArtUrl : null,
    entries: tracks.map(toEntry)
  };
}

export function toTeamsMessage(card: TrackCard): TeamsMessage {
  const body: AdaptiveCardElement[] = [
    {
      type: "TextBlock",
      text: card.title,
      wrap: true,
      weight: "Bolder",
      size: "Medium"
    }
  ];

  if (card.headerImageUrl) {
    body.push({
      type: "Image",
      url: card.headerImageUrl,
      altText: "Album art of the most recently played track",
      size: "Medium"
    });
  }

  for (const entry of card.entries) {
    body.push({
      type: "TextBlock",
      text: entry.text,
      wrap: true,
      spacing: "Small"
    });
  }

  if (card.entries.length === 0) {
    body.push({
      type: "TextBlock",
      text: EMPTY_CARD_TEXT,
      wrap: true,
      isSubtle: true
    });
  }

  return {
    type: "message",
    attachments: [
      {
        contentType: "application/vnd.microsoft.card.adaptive",
        contentUrl: null,
        content: {
          $schema: "http://adaptivecards.io/schemas/adaptive-card.json",
          type: "AdaptiveCard",
          version: "1.4",
          body
        }
      }
    ]
  };
}
