export interface YoutubeClientConfig {
  apiKey: string
  baseUrl?: string
}

export interface ChannelStats {
  channelId: string
  title: string
  subscriberCount: number
  videoCount: number
  viewCount: number
  publishedAt: string | null
}

/** Raw `channels.list` item; counts arrive as decimal strings */
export interface YoutubeChannelItem {
  id: string
  snippet?: {
    title?: string
    publishedAt?: string
  }
  statistics?: {
    subscriberCount?: string
    videoCount?: string
    viewCount?: string
    hiddenSubscriberCount?: boolean
  }
}

export interface YoutubeSearchItem {
  id: { kind: string; channelId?: string }
}

export interface YoutubeListResponse<T> {
  items?: T[]
  nextPageToken?: string
}

export interface YoutubeErrorBody {
  error?: {
    code?: number
    message?: string
    errors?: Array<{ reason?: string; message?: string }>
  }
}
