export const serverMetadata = {
  title: 'Agent Tools',
  instructions: `Use these tools to work with the user's email, calendar, music, and local weather.

Tools
- list_email_labels / list_recent_emails / read_email_content: Browse Gmail. list_recent_emails takes an optional label_name (exact label name from list_email_labels) and max_results. Use the Message ID it returns with read_email_content or reply_to_email.
- send_email / reply_to_email: Send plain-text mail. Confirm recipients and content with the user before sending.
- list_calendars / list_upcoming_events: Read Google Calendar. calendar_id defaults to 'primary'.
- create_event / update_event / delete_event: Change events. Times are ISO 8601 (YYYY-MM-DDTHH:MM:SS).
- search_and_play: Play a song on Spotify from free text such as "Imagine by John Lennon" or "Imagine - John Lennon". Picks the closest match and the active device (or the first available one); launches the desktop app once if no device is available.
- find_location: The user's approximate city, region, and country from their IP address. Use it when a weather request names no place.
- current_weather / forecast_weather: Conditions and forecasts for a city. forecast_weather takes an optional date (YYYY-MM-DD).

Notes
- Errors come back as text starting with "An error occurred" or "Error"; relay them instead of retrying blindly.
- If a call reports an authorization problem, ask the user to check the server's credentials.`,
} as const;

export const toolsMetadata = {
  list_email_labels: {
    name: 'list_email_labels',
    title: 'List Email Labels',
    description: 'List all available email labels/folders in the Gmail account.',
  },
  list_recent_emails: {
    name: 'list_recent_emails',
    title: 'List Recent Emails',
    description:
      'List recent emails, optionally filtered by label name. Inputs: label_name (optional, exact name), max_results (1-100, default 10). Returns sender, subject, date, and Message ID.',
  },
  read_email_content: {
    name: 'read_email_content',
    title: 'Read Email',
    description: 'Retrieve the full content of a specific email by its Message ID.',
  },
  send_email: {
    name: 'send_email',
    title: 'Send Email',
    description: 'Send a new plain-text email. Inputs: to, subject, body.',
  },
  reply_to_email: {
    name: 'reply_to_email',
    title: 'Reply to Email',
    description:
      'Reply to the sender of a specific email, in the same thread. Inputs: message_id, reply_text.',
  },
  list_calendars: {
    name: 'list_calendars',
    title: 'List Calendars',
    description: 'List all available calendars in the Google Calendar account.',
  },
  list_upcoming_events: {
    name: 'list_upcoming_events',
    title: 'List Upcoming Events',
    description:
      "List upcoming events. Inputs: calendar_id (default 'primary'), max_results (1-250, default 10), days_ahead (1-365, default 30).",
  },
  create_event: {
    name: 'create_event',
    title: 'Create Calendar Event',
    description:
      'Create an event. Inputs: summary, start_time and end_time (ISO 8601, YYYY-MM-DDTHH:MM:SS), optional description and calendar_id.',
  },
  update_event: {
    name: 'update_event',
    title: 'Update Calendar Event',
    description:
      'Update an existing event. Only the provided fields change. Inputs: event_id, optional calendar_id, summary, start_time, end_time, description.',
  },
  delete_event: {
    name: 'delete_event',
    title: 'Delete Calendar Event',
    description: 'Delete an event. Inputs: event_id, optional calendar_id.',
  },
  search_and_play: {
    name: 'search_and_play',
    title: 'Search and Play Music',
    description:
      'Search Spotify and play the best-matching track. Inputs: query ("Song", "Song by Artist", or "Song - Artist"), optional search_type (track).',
  },
  find_location: {
    name: 'find_location',
    title: 'Find Current Location',
    description:
      "Retrieve the user's current city, region, and country from their IP address when no location was given.",
  },
  current_weather: {
    name: 'current_weather',
    title: 'Current Weather',
    description: 'Retrieve current weather for a location (city name).',
  },
  forecast_weather: {
    name: 'forecast_weather',
    title: 'Weather Forecast',
    description:
      'Retrieve the weather forecast for a location, optionally for a specific date (YYYY-MM-DD, up to 14 days ahead). Without a date, returns today.',
  },
  health: {
    name: 'health',
    title: 'Health Check',
    description: 'Check server health, uptime, and runtime information',
  },
} as const;
