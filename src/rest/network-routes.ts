/**
 * network-routes.ts — read-only Express router over the peer registry.
 *
 * Endpoints:
 *   GET /v1/network                           — Verified peers and walkable addresses
 *   GET /v1/network/walkable?service=<id>     — Walkable addresses, optionally by introducer service
 *   GET /v1/network/peers/:identityKey        — One verified peer
 *   GET /v1/network/services/:serviceId/peers — Verified peers advertising a service
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { rateLimit } from 'express-rate-limit';
import { addressKey, type Address } from '../registry/address.js';
import type { VerifiedPeer } from '../registry/peer.js';
import type { ServiceId } from '../registry/service-id.js';

const apiRateLimit = rateLimit({
  windowMs: 60_000,
  limit: 120,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many requests — try again later' },
});

/**
 * Minimal interface of the registry that the router depends on.
 */
export interface NetworkView {
  readonly verifiedPeers: readonly VerifiedPeer[];
  getWalkableAddresses(service?: ServiceId): Address[];
  getIntroductionsFrom(peer: VerifiedPeer): Address[];
  getIntroducer(address: Address): VerifiedPeer | undefined;
  getServicesForPeer(peer: VerifiedPeer): Set<ServiceId>;
  getPeersForService(service: ServiceId): VerifiedPeer[];
  getVerifiedByIdentity(identityKey: string): VerifiedPeer | undefined;
}

/** A verified peer as returned by the inspection endpoints */
export interface PeerSummary {
  identityKey: string;
  publicKey: string;
  address: string;
  lastSeen: number;
  services: ServiceId[];
  introductions: string[];
  /** Identity key of the peer that introduced this one's address, if known */
  introducedBy?: string;
}

function summarize(network: NetworkView, peer: VerifiedPeer): PeerSummary {
  const introducer = network.getIntroducer(peer.address);
  return {
    identityKey: peer.identityKey,
    publicKey: peer.publicKey,
    address: addressKey(peer.address),
    lastSeen: peer.lastSeen,
    services: Array.from(network.getServicesForPeer(peer)),
    introductions: network.getIntroductionsFrom(peer).map(addressKey),
    ...(introducer ? { introducedBy: introducer.identityKey } : {}),
  };
}

/**
 * Create the inspection router.
 */
export function createNetworkRouter(network: NetworkView): Router {
  const router = Router();
  router.use(apiRateLimit);

  router.get('/v1/network', (_req: Request, res: Response) => {
    res.json({
      verified: network.verifiedPeers.map(peer => summarize(network, peer)),
      walkable: network.getWalkableAddresses().map(addressKey),
    });
  });

  router.get('/v1/network/walkable', (req: Request, res: Response) => {
    const { service } = req.query;
    if (service !== undefined && typeof service !== 'string') {
      res.status(400).json({ error: 'service must be a single value' });
      return;
    }
    res.json({ addresses: network.getWalkableAddresses(service).map(addressKey) });
  });

  router.get('/v1/network/peers/:identityKey', (req: Request, res: Response) => {
    const peer = network.getVerifiedByIdentity(req.params.identityKey.toLowerCase());
    if (!peer) {
      res.status(404).json({ error: 'Peer not found' });
      return;
    }
    res.json(summarize(network, peer));
  });

  router.get('/v1/network/services/:serviceId/peers', (req: Request, res: Response) => {
    const peers = network.getPeersForService(req.params.serviceId);
    res.json({ peers: peers.map(peer => summarize(network, peer)) });
  });

  return router;
}
