/**
 * ListenBrainz Wire Types
 *
 * @see https://listenbrainz.readthedocs.io/en/latest/users/json.html
 * @module types/listenbrainz
 */

export type ListenType = 'single' | 'playing_now' | 'import'

export interface AdditionalInfo {
  listening_from: string
  tracknumber?: number
  discnumber?: number
  duration?: number
  recording_mbid?: string
  release_mbid?: string
}

export interface TrackMetadata {
  additional_info: AdditionalInfo
  artist_name: string
  track_name: string
  release_name: string
}

export interface ListenPayload {
  listened_at: number
  track_metadata: TrackMetadata
}

export interface SubmitListensBody {
  listen_type: ListenType
  payload: ListenPayload[]
}
