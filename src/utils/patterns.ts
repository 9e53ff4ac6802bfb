/**
 * Regex patterns for resume parsing that are part of the extraction logic
 * rather than the swappable vocabulary (see registry/)
 */

export const Patterns = {
  // Contact information
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/,

  // Tried in order; the first match that is not a date wins
  phone: [
    /\+\d{1,3}[-.\s]?\(?\d{1,4}\)?[-.\s]?\d{3,4}[-.\s]?\d{3,4}/g, // +1-234-567-8900
    /\(?\b\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g, // (123) 456-7890, 123.456.7890
    /\b\d{10,11}\b/g, // 1234567890
    /\+\d{1,4}[-\s]?\d{6,14}\b/g, // generic international
  ],

  // "2015-2018", "2015 - 2018", bare years
  yearLike: /^(?:\d{4}|\d{4}\s*[-–—/.]\s*\d{2,4})$/,

  // City, Region or City, Country; stays on one line
  location: [
    /\b([A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)*),[ \t]*([A-Z]{2})\b/g,
    /\b([A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)*),[ \t]*([A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)*)/g,
  ],

  // A name token: a letter, then letters, dots, apostrophes or hyphens
  nameToken: /^\p{L}[\p{L}.'’-]*$/u,

  // Section headers must be the whole line, optionally followed by a colon
  sections: {
    certifications:
      /^[^\w]*(?:certifications?|certificates|credentials|licen[cs]es?(?:\s*(?:&|and)\s*certifications?)?|certifications?\s*(?:&|and)\s*(?:licen[cs]es?|awards|achievements))\s*:?\s*$/i,
    education: /^[^\w]*(?:education|academic background|qualifications?)\s*:?\s*$/i,
    experience:
      /^[^\w]*(?:(?:work|professional)\s+)?(?:experience|employment(?:\s+history)?|work history)\s*:?\s*$/i,
    skills: /^[^\w]*(?:(?:technical|core|key)\s+)?(?:skills|competencies|expertise)\s*:?\s*$/i,
    projects: /^[^\w]*(?:projects|portfolio)\s*:?\s*$/i,
    summary: /^[^\w]*(?:summary|professional summary|profile|objective|about me)\s*:?\s*$/i,
    references: /^[^\w]*references\s*:?\s*$/i,
    languages: /^[^\w]*languages?(?:\s+skills)?\s*:?\s*$/i,
    awards:
      /^[^\w]*(?:awards?|honou?rs(?:\s*(?:&|and)\s*awards)?|achievements|awards\s*(?:&|and)\s*(?:honou?rs|achievements))\s*:?\s*$/i,
    publications: /^[^\w]*(?:publications|research)\s*:?\s*$/i,
    volunteer:
      /^[^\w]*(?:volunteer(?:ing)?(?:\s+(?:work|experience))?|community\s+involvement)\s*:?\s*$/i,
    interests: /^[^\w]*(?:interests|hobbies(?:\s*(?:&|and)\s*interests)?)\s*:?\s*$/i,
  },

  // Generic certificate line shapes: "Name – Issuer" and "Name (CODE)"
  certificateLine: [
    /^(.{3,80}?)\s+[-–—|]\s+(.{2,60})$/,
    /^(.{3,80}?)\s*\(([A-Z0-9][A-Z0-9+\- ]{1,15})\)$/,
  ],

  // Bullet points
  bulletPoint: /^[•‣▪●◦\-*]\s*/,
}

export const Limits = {
  skills: 10,
  certifications: 15,
  companies: 10,
  jobTitles: 5,
  nameScanLines: 15,
  headerZoneChars: 1000,
  maxYearsExperience: 50,
  earliestPlausibleYear: 1950,
  dateContextRadius: 100,
  titleContextRadius: 100,
  locationContextRadius: 30,
} as const
