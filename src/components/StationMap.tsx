import { MapContainer, TileLayer, Marker, Tooltip, useMap } from 'react-leaflet';
import 'leaflet/dist/leaflet.css';
import L from 'leaflet';
import { useEffect, useMemo, useState } from 'react';
import type { Station } from '../types';

// Fix Leaflet default icon issue in React
import icon from 'leaflet/dist/images/marker-icon.png';
import iconShadow from 'leaflet/dist/images/marker-shadow.png';

const ICON_BASE: L.IconOptions = {
    iconUrl: icon,
    shadowUrl: iconShadow,
    iconSize: [25, 41],
    iconAnchor: [12, 41]
};

const DefaultIcon = L.icon(ICON_BASE);
const SelectedIcon = L.icon({ ...ICON_BASE, className: 'leaflet-marker-selected' });
const InactiveIcon = L.icon({ ...ICON_BASE, className: 'leaflet-marker-inactive' });

L.Marker.prototype.options.icon = DefaultIcon;

const UK_CENTER: L.LatLngTuple = [52.8, -1.6];

interface MapProps {
    stations: Station[];
    selectedStation?: Station;
    onSelect: (station: Station) => void;
    maxMarkers?: number;
}

function MapUpdater({ center }: { center?: L.LatLngTuple }) {
    const map = useMap();
    useEffect(() => {
        if (center) {
            map.flyTo(center, 11);
        }
    }, [center, map]);
    return null;
}

export function StationMap({ stations, selectedStation, onSelect, maxMarkers = 1500 }: MapProps) {
    const [darkMode, setDarkMode] = useState(document.documentElement.classList.contains('dark'));

    useEffect(() => {
        const observer = new MutationObserver(() => {
            setDarkMode(document.documentElement.classList.contains('dark'));
        });

        observer.observe(document.documentElement, {
            attributes: true,
            attributeFilter: ['class']
        });

        return () => observer.disconnect();
    }, []);

    const located = stations.filter(s => s.coordinates).slice(0, maxMarkers);
    const latitude = selectedStation?.coordinates?.latitude;
    const longitude = selectedStation?.coordinates?.longitude;
    const center = useMemo<L.LatLngTuple | undefined>(
        () => (latitude !== undefined && longitude !== undefined ? [latitude, longitude] : undefined),
        [latitude, longitude]
    );

    return (
        <div className="h-full w-full rounded-lg overflow-hidden border border-border shadow-sm relative">
            <MapContainer
                center={UK_CENTER}
                zoom={6}
                style={{ height: '100%', width: '100%' }}
                className="z-0"
            >
                {darkMode ? (
                    <TileLayer
                        key="dark"
                        attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors &copy; <a href="https://carto.com/attributions">CARTO</a>'
                        url="https://{s}.basemaps.cartocdn.com/dark_all/{z}/{x}/{y}{r}.png"
                    />
                ) : (
                    <TileLayer
                        key="light"
                        attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors'
                        url="https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png"
                    />
                )}
                <MapUpdater center={center} />
                {located.map(st => {
                    const coords = st.coordinates;
                    if (!coords) return null;
                    const isSelected = st.id === selectedStation?.id;

                    let markerIcon = DefaultIcon;
                    if (isSelected) {
                        markerIcon = SelectedIcon;
                    } else if (st.status === 'closed' || st.status === 'suspended') {
                        markerIcon = InactiveIcon;
                    }

                    return (
                        <Marker
                            key={st.id}
                            position={[coords.latitude, coords.longitude]}
                            opacity={isSelected ? 1.0 : 0.7}
                            icon={markerIcon}
                            eventHandlers={{ click: () => onSelect(st) }}
                        >
                            <Tooltip>{st.name}{st.river ? ` (${st.river})` : ''}</Tooltip>
                        </Marker>
                    );
                })}
            </MapContainer>

            {stations.length > located.length && (
                <div className="absolute bottom-4 left-4 z-[500] bg-background/90 border border-border px-3 py-2 rounded-lg text-xs text-muted-foreground pointer-events-none">
                    Showing {located.length} of {stations.length} stations on the map
                </div>
            )}
        </div>
    );
}
