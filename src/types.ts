export interface UserCredentials {
  username: string;
  client_id: string;
  client_secret: string;
  redirect_uri: string;
  refresh_token: string;
}

export const USER_CREDENTIAL_KEYS = [
  "username",
  "client_id",
  "client_secret",
  "redirect_uri",
  "refresh_token"
] as const satisfies readonly (keyof UserCredentials)[];

export interface SpotifyUser {
  id: string;
  display_name: string | null;
}

export interface TrackRecord {
  title: string;
  artist: string;
  albumArtUrl: string | null;
  trackUrl: string | null;
  playedAt: string;
}

export interface TrackCardEntry {
  position: number;
  text: string;
  trackUrl: string | null;
}

export interface TrackCard {
  title: string;
  headerImageUrl: string | null;
  entries: TrackCardEntry[];
}

export type AdaptiveCardElement =
  | {
      type: "TextBlock";
      text: string;
      wrap: true;
      weight?: "Bolder";
      size?: "Medium";
      isSubtle?: true;
      spacing?: "Small";
    }
  | {
      type: "Image";
      url: string;
      altText: string;
      size: "Medium";
    };

export interface AdaptiveCard {
  $schema: "http://adaptivecards.io/schemas/adaptive-card.json";
  type: "AdaptiveCard";
  version: "1.4";
  body: AdaptiveCardElement[];
}

export interface TeamsMessage {
  type: "message";
  attachments: Array<{
    contentType: "application/vnd.microsoft.card.adaptive";
    contentUrl: null;
    content: AdaptiveCard;
  }>;
}

export type NotifyStage = "authenticate" | "fetch" | "build" | "deliver";

export type NotifyResult =
  | {
      username: string;
      status: "posted";
      trackCount: number;
    }
  | {
      username: string;
      status: "failed";
      stage: NotifyStage;
      error: Error;
    };

export interface RunSummary {
  results: NotifyResult[];
  postedCount: number;
  failedCount: number;
}
