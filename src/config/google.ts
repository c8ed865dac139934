// src/config/google.ts
import { google } from 'googleapis';
import { env } from './environment';

export const oauth2Client = new google.auth.OAuth2(
  env.GOOGLE_CLIENT_ID,
  env.GOOGLE_CLIENT_SECRET,
  env.OAUTH_REDIRECT_URL
);

oauth2Client.setCredentials({
  refresh_token: env.GOOGLE_REFRESH_TOKEN
});

// Every Google request gives up after the collaborator timeout
google.options({ timeout: env.COLLABORATOR_TIMEOUT_MS });

export const calendar = google.calendar({ version: 'v3', auth: oauth2Client });
export const gmail = google.gmail({ version: 'v1', auth: oauth2Client });
export const people = google.people({ version: 'v1', auth: oauth2Client });
