import admin from "firebase-admin";
import type { Firestore } from "firebase-admin/firestore";

let inited = false;

export function app(projectId?: string) {
  if (!inited) {
    admin.initializeApp(projectId ? { projectId } : undefined);
    inited = true;
  }
  return admin;
}

export const db = (projectId?: string): Firestore => app(projectId).firestore();
