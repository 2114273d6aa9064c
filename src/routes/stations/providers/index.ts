import { StationProvider } from "../StationProvider";
import { AemetStationProvider } from "./AemetStationProvider";
import { EuskalmetStationProvider } from "./EuskalmetStationProvider";
import { MeteocatStationProvider } from "./MeteocatStationProvider";
import { MeteoGaliciaStationProvider } from "./MeteoGaliciaStationProvider";
import { NwsStationProvider } from "./NwsStationProvider";

export { AemetStationProvider, EuskalmetStationProvider, MeteocatStationProvider, MeteoGaliciaStationProvider, NwsStationProvider };

/**
 * Creates every inventory-backed station provider, reading from the given stations directory.
 */
export function createStationProviders( stationsLocation: string ): StationProvider[] {
	return [
		new AemetStationProvider( stationsLocation ),
		new MeteocatStationProvider( stationsLocation ),
		new EuskalmetStationProvider( stationsLocation ),
		new MeteoGaliciaStationProvider( stationsLocation ),
		new NwsStationProvider( stationsLocation )
	];
}
