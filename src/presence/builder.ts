import type { Activity } from './models';
import { ActivitySchema, ActivityType } from './models';

const MAX_TEXT_LENGTH = 128;

export class ActivityBuilder {
  private name: string = '';
  private type: ActivityType = ActivityType.GAME;
  private state: string | null = null;
  private url: string | null = null;

  setName(name: string): this {
    this.name = name;
    return this;
  }

  setType(type: ActivityType): this {
    this.type = type;
    return this;
  }

  setState(state: string | null): this {
    this.state = state;
    return this;
  }

  /** Sets the stream url and switches the activity to `STREAMING`. */
  setStreamUrl(url: string | null): this {
    this.url = url;
    if (url !== null) {
      this.type = ActivityType.STREAMING;
    }
    return this;
  }

  private sanitizeString(value: string | null): string | null {
    if (!value) return null;
    return value.length > MAX_TEXT_LENGTH ? value.substring(0, MAX_TEXT_LENGTH) : value;
  }

  build(): Activity {
    const activityData: Record<string, unknown> = {
      name: this.sanitizeString(this.name) ?? '',
      type: this.type
    };

    if (this.state !== null) activityData.state = this.sanitizeString(this.state);
    if (this.url !== null) activityData.url = this.url;

    return ActivitySchema.parse(activityData);
  }
}
