export const SAMPLE_QUERIES = [
  'What are the symptoms of diabetes?',
  'How is hypertension treated?',
  'What are the side effects of metformin?',
  'When should I see a doctor for chest pain?',
  'What causes migraine headaches?',
  'How to prevent heart disease?',
  'What are the signs of a stroke?',
  'Drug interactions with warfarin',
];

export const HEALTH_TIPS = [
  'Drink 8 glasses of water daily',
  'Get 7-9 hours of sleep',
  'Exercise for 30 minutes daily',
  'Eat 5 servings of fruits/vegetables',
  'Practice stress management',
  'Take regular health screenings',
];

export const EMERGENCY_CONTACTS = [
  { name: 'Emergency', contact: '911' },
  { name: 'Poison Control', contact: '1-800-222-1222' },
  { name: 'Crisis Text Line', contact: 'Text HOME to 741741' },
  { name: 'National Suicide Prevention', contact: '988' },
];

export const tipOfTheDay = (date: Date = new Date()): string =>
  HEALTH_TIPS[date.getDate() % HEALTH_TIPS.length];
