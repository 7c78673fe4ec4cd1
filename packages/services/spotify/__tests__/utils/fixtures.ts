// Spotify Web API response fixtures

export const spotifyFixtures = {
  artistSearch: {
    artists: {
      items: [
        {
          id: 'artist-odesza',
          name: 'ODESZA',
          genres: ['chillwave', 'edm', 'indietronica'],
          popularity: 71,
          images: [
            { url: 'https://i.scdn.co/image/odesza-640', height: 640, width: 640 },
            { url: 'https://i.scdn.co/image/odesza-320', height: 320, width: 320 },
            { url: 'https://i.scdn.co/image/odesza-160', height: 160, width: 160 },
          ],
        },
      ],
    },
  },

  topTracks: {
    tracks: [
      { id: 'track-1', name: 'Say My Name', popularity: 68 },
      { id: 'track-2', name: 'A Moment Apart', popularity: 64 },
      { id: 'track-3', name: 'Say My Name - Remix', popularity: 41 },
    ],
  },

  audioFeatures: {
    id: 'track-1',
    danceability: 0.61,
    energy: 0.72,
    tempo: 123.9,
    speechiness: 0.05,
    acousticness: 0.01,
  },

  playlist: {
    id: 'playlist-123',
    uri: 'spotify:playlist:playlist-123',
    external_urls: { spotify: 'https://open.spotify.com/playlist/playlist-123' },
  },
};
